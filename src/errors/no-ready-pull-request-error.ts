/**
 * Error thrown when no open pull request passes the readiness predicate
 */

import type { RefusalReason } from '../types';

export interface CandidateRefusal {
  readonly pullRequestNumber: number;
  readonly reasons: RefusalReason[];
}

export class NoReadyPullRequestError extends Error {
  public readonly refusals: CandidateRefusal[];

  constructor(message: string, refusals: CandidateRefusal[] = []) {
    super(message);
    this.name = 'NoReadyPullRequestError';
    this.refusals = refusals;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, NoReadyPullRequestError);
    }
  }
}
