/**
 * Error thrown when there is no pending queue item to promote
 */

export class EmptyQueueError extends Error {
  public readonly pendingDir: string;

  constructor(message: string, pendingDir: string) {
    super(message);
    this.name = 'EmptyQueueError';
    this.pendingDir = pendingDir;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmptyQueueError);
    }
  }
}
