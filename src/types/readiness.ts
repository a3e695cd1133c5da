/**
 * Merge readiness types
 */

import type { IssueCategory } from './issue';
import type { PullRequest } from './pull-request';

export type RefusalReason =
  | 'NOT_OPEN'
  | 'IS_DRAFT'
  | 'WORK_IN_PROGRESS'
  | 'REVIEW_NOT_REQUESTED'
  | 'MERGE_CONFLICT'
  | 'NOT_MERGEABLE';

export interface Readiness {
  readonly ready: boolean;
  readonly reasons: RefusalReason[];
}

export interface ReadinessPolicy {
  /** Treat a draft as ready because it can be flipped to ready-for-review first */
  readonly allowDraftFlip: boolean;
}

export interface MergeCandidate {
  readonly pullRequest: PullRequest;
  readonly category: IssueCategory;
  readonly issueNumber: number;
}
