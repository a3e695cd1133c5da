/**
 * Pull request types
 */

export type PullRequestState = 'open' | 'closed' | 'merged';

export type MergeMethod = 'merge' | 'squash' | 'rebase';

export interface PullRequestFilter {
  readonly state: 'open' | 'closed' | 'all';
}

/**
 * Entry from the pull request list endpoint. Mergeability is not included there.
 */
export interface PullRequestSummary {
  readonly number: number;
  readonly title: string;
  readonly body: string;
  readonly url: string;
  readonly state: PullRequestState;
  readonly isDraft: boolean;
  readonly baseBranch: string;
  readonly headBranch: string;
  readonly headRepository: string;
  readonly requestedReviewerCount: number;
  readonly nodeId?: string;
}

export interface PullRequestDetails extends PullRequestSummary {
  readonly mergeable: boolean | null;
  readonly mergeableState: string | null;
}

export interface PullRequest {
  readonly number: number;
  readonly title: string;
  readonly body: string;
  readonly url: string;
  readonly state: PullRequestState;
  readonly isDraft: boolean;
  readonly hasReviewRequested: boolean;
  readonly isConflicted: boolean;
  readonly baseBranch: string;
  readonly headBranch: string;
  readonly headRepository: string;
  readonly sourceIssueNumber?: number;
  readonly nodeId?: string;
}

export interface PullRequestReview {
  readonly author: string;
  readonly state: string;
  readonly submittedAt?: Date;
}

export type DiscussionKind = 'ISSUE_COMMENT' | 'REVIEW' | 'REVIEW_COMMENT';

export interface DiscussionItem {
  readonly kind: DiscussionKind;
  readonly author: string;
  readonly body: string;
  readonly createdAt: Date;
  readonly url?: string;
}

export interface MergeOutcome {
  readonly merged: boolean;
  readonly message: string;
  readonly sha?: string;
  readonly status?: number;
}
