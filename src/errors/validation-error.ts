/**
 * Error thrown when configuration validation fails
 */

export class ValidationError extends Error {
  public readonly problems: string[];
  public readonly cause?: Error;

  constructor(message: string, problems: string[], cause?: Error) {
    super(message);
    this.name = 'ValidationError';
    this.problems = problems;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}
