/**
 * Error thrown when a call to the issue/PR repository fails (transport, auth, API)
 */

export class UpstreamApiError extends Error {
  public readonly operation: string;
  public readonly status?: number;
  public readonly cause?: Error;

  constructor(message: string, operation: string, status?: number, cause?: Error) {
    super(message);
    this.name = 'UpstreamApiError';
    this.operation = operation;
    this.status = status;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamApiError);
    }
  }
}
