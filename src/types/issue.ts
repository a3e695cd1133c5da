/**
 * Issue types for the GitHub issue/PR loop
 */

export type IssueCategory = 'development' | 'capability' | 'gapAnalysis';

export type IssueState = 'open' | 'closed';

/**
 * Target the Copilot coding agent works against once it is assigned
 */
export interface AgentAssignment {
  readonly targetRepo: string;
  readonly baseBranch?: string;
}

export interface PullRequestRef {
  readonly number: number;
  readonly url: string;
}

/**
 * Issue as returned by the issue repository, before the loop categorises it
 */
export interface IssueRecord {
  readonly number: number;
  readonly title: string;
  readonly body: string;
  readonly url: string;
  readonly state: IssueState;
  readonly labels: string[];
  readonly assignees: string[];
  readonly createdAt: Date;
}

/**
 * Issue that belongs to the loop
 */
export interface Issue extends IssueRecord {
  readonly category: IssueCategory;
  readonly isGapAnalysis: boolean;
  readonly linkedPullRequest?: PullRequestRef;
}

export interface IssueFilter {
  readonly state: IssueState | 'all';
  readonly labels?: string[];
}

export interface NewIssue {
  readonly title: string;
  readonly body: string;
  readonly labels?: string[];
}

export interface CreatedIssue {
  readonly number: number;
  readonly url: string;
  readonly title: string;
}
