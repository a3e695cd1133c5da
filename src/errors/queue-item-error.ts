/**
 * Error thrown when a queue file cannot be read, parsed or moved
 */

export class QueueItemError extends Error {
  public readonly queuePath: string;
  public readonly cause?: Error;

  constructor(message: string, queuePath: string, cause?: Error) {
    super(message);
    this.name = 'QueueItemError';
    this.queuePath = queuePath;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueueItemError);
    }
  }
}
