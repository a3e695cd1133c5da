/**
 * Error thrown when the merge gate refuses to merge a pull request
 */

import type { RefusalReason } from '../types';

export class MergeRefusedError extends Error {
  public readonly prNumber: number;
  public readonly reasons: RefusalReason[];
  public readonly cause?: Error;

  constructor(message: string, prNumber: number, reasons: RefusalReason[], cause?: Error) {
    super(message);
    this.name = 'MergeRefusedError';
    this.prNumber = prNumber;
    this.reasons = reasons;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MergeRefusedError);
    }
  }
}
