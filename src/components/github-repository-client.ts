/**
 * GitHub Repository Client Component
 *
 * Issue and pull request access for the loop. REST calls go through Octokit;
 * the ready-for-review flip has no REST endpoint and uses the GraphQL API.
 * Every failure is wrapped in UpstreamApiError and never retried here.
 */

import { graphql } from '@octokit/graphql';
import { Octokit } from '@octokit/rest';
import type {
  AgentAssignment,
  CreatedIssue,
  DiscussionItem,
  IssueFilter,
  IssueRecord,
  MergeMethod,
  MergeOutcome,
  NewIssue,
  PullRequestDetails,
  PullRequestFilter,
  PullRequestReview,
  PullRequestState,
  PullRequestSummary
} from '../types';
import { UpstreamApiError } from '../errors';
import { logger } from '../utils/logger';

export interface IssueRepository {
  listIssues(filter: IssueFilter): Promise<IssueRecord[]>;
  createIssue(issue: NewIssue): Promise<CreatedIssue>;
  /**
   * @returns The issue's assignees after the call. GitHub drops logins it
   * cannot assign without failing the request.
   */
  addAssignees(issueNumber: number, assignees: string[], agentAssignment?: AgentAssignment): Promise<string[]>;
  updateIssueBody(issueNumber: number, body: string): Promise<void>;
  findIssueByBodyMarker(marker: string): Promise<IssueRecord | undefined>;
  listPullRequests(filter: PullRequestFilter): Promise<PullRequestSummary[]>;
  getPullRequest(pullNumber: number): Promise<PullRequestDetails>;
  listPullRequestReviews(pullNumber: number): Promise<PullRequestReview[]>;
  listPullRequestDiscussion(pullNumber: number): Promise<DiscussionItem[]>;
  listCrossReferencedPullRequests(issueNumber: number): Promise<number[]>;
  setReadyForReview(nodeId: string): Promise<void>;
  mergePullRequest(pullNumber: number, method: MergeMethod): Promise<MergeOutcome>;
  deleteBranch(branch: string): Promise<void>;
}

export interface GitHubRepositoryClientConfig {
  readonly owner: string;
  readonly repo: string;
  readonly token: string;
  readonly apiUrl?: string;
  /** Replaces the global fetch for both REST and GraphQL requests */
  readonly fetch?: typeof fetch;
}

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

/** Status codes GitHub uses to refuse a merge rather than fail the request */
const MERGE_REFUSAL_STATUSES = new Set([405, 409, 422]);

interface RestUser {
  readonly login: string;
}

interface RestIssue {
  readonly number: number;
  readonly title: string;
  readonly body?: string | null;
  readonly html_url: string;
  readonly state: string;
  readonly labels: Array<string | { readonly name?: string }>;
  readonly assignees?: RestUser[] | null;
  readonly created_at: string;
  readonly pull_request?: unknown;
}

interface RestPullRequest {
  readonly number: number;
  readonly title: string;
  readonly body: string | null;
  readonly html_url: string;
  readonly state: string;
  readonly draft?: boolean;
  readonly merged_at: string | null;
  readonly node_id: string;
  readonly base: { readonly ref: string };
  readonly head: { readonly ref: string; readonly repo: { readonly full_name: string } | null };
  readonly requested_reviewers?: unknown[] | null;
  readonly requested_teams?: unknown[] | null;
}

/**
 * GraphQL endpoint base for a REST API URL. GitHub Enterprise serves REST at
 * `/api/v3` and GraphQL at `/api/graphql`.
 */
export function graphqlBaseUrl(apiUrl: string): string {
  return apiUrl.replace(/\/+$/, '').replace(/\/v3$/, '');
}

export function toAgentAssignmentPayload(assignment: AgentAssignment): Record<string, string> {
  const payload: Record<string, string> = { target_repo: assignment.targetRepo };
  if (assignment.baseBranch?.trim()) {
    payload.base_branch = assignment.baseBranch.trim();
  }
  return payload;
}

export function toIssueRecord(issue: RestIssue): IssueRecord {
  return {
    number: issue.number,
    title: issue.title,
    body: issue.body ?? '',
    url: issue.html_url,
    state: issue.state === 'closed' ? 'closed' : 'open',
    labels: issue.labels
      .map(label => (typeof label === 'string' ? label : label.name ?? ''))
      .filter(name => name !== ''),
    assignees: (issue.assignees ?? []).map(user => user.login),
    createdAt: new Date(issue.created_at)
  };
}

export function toPullRequestSummary(pull: RestPullRequest): PullRequestSummary {
  let state: PullRequestState = 'open';
  if (pull.merged_at) {
    state = 'merged';
  } else if (pull.state === 'closed') {
    state = 'closed';
  }

  return {
    number: pull.number,
    title: pull.title,
    body: pull.body ?? '',
    url: pull.html_url,
    state,
    isDraft: pull.draft === true,
    baseBranch: pull.base.ref,
    headBranch: pull.head.ref,
    headRepository: pull.head.repo?.full_name ?? '',
    requestedReviewerCount: (pull.requested_reviewers ?? []).length + (pull.requested_teams ?? []).length,
    nodeId: pull.node_id
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * PR number of a `cross-referenced` timeline event whose source is a pull
 * request in the given repository
 */
export function crossReferencedPullNumber(event: unknown, repository: string): number | undefined {
  if (!isRecord(event) || event.event !== 'cross-referenced' || !isRecord(event.source)) {
    return undefined;
  }
  const source = event.source.issue;
  if (!isRecord(source) || !isRecord(source.pull_request) || typeof source.number !== 'number') {
    return undefined;
  }
  if (isRecord(source.repository) && source.repository.full_name !== repository) {
    return undefined;
  }
  return source.number;
}

function httpStatus(error: unknown): number | undefined {
  if (isRecord(error) && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * IssueRepository backed by the GitHub REST and GraphQL APIs
 */
export class GitHubRepositoryClient implements IssueRepository {
  private readonly config: GitHubRepositoryClientConfig;
  private readonly octokit: Octokit;
  private readonly graphqlClient: typeof graphql;

  constructor(config: GitHubRepositoryClientConfig) {
    this.config = config;
    const apiUrl = config.apiUrl || DEFAULT_GITHUB_API_URL;
    const request = config.fetch ? { fetch: config.fetch } : undefined;

    this.octokit = new Octokit({ auth: config.token, baseUrl: apiUrl, request });
    this.graphqlClient = graphql.defaults({
      baseUrl: graphqlBaseUrl(apiUrl),
      headers: {
        authorization: `token ${config.token}`
      },
      request
    });
  }

  get repository(): string {
    return `${this.config.owner}/${this.config.repo}`;
  }

  /**
   * Lists issues, skipping the pull requests the issues endpoint also returns
   */
  async listIssues(filter: IssueFilter): Promise<IssueRecord[]> {
    return this.call('listIssues', async () => {
      const issues = await this.octokit.paginate(this.octokit.issues.listForRepo, {
        owner: this.config.owner,
        repo: this.config.repo,
        state: filter.state,
        labels: filter.labels && filter.labels.length > 0 ? filter.labels.join(',') : undefined,
        per_page: 100
      });
      return issues.filter(issue => !issue.pull_request).map(toIssueRecord);
    });
  }

  async createIssue(issue: NewIssue): Promise<CreatedIssue> {
    return this.call('createIssue', async () => {
      const { data } = await this.octokit.issues.create({
        owner: this.config.owner,
        repo: this.config.repo,
        title: issue.title,
        body: issue.body,
        labels: issue.labels
      });
      logger.info('Issue created', { issueNumber: data.number, title: data.title });
      return { number: data.number, url: data.html_url, title: data.title };
    });
  }

  /**
   * A Copilot assignee also takes an `agent_assignment` payload naming the
   * repository and base branch the agent should work on. Empty values are left out.
   */
  async addAssignees(issueNumber: number, assignees: string[], agentAssignment?: AgentAssignment): Promise<string[]> {
    return this.call('addAssignees', async () => {
      const { data } = await this.octokit.issues.addAssignees({
        owner: this.config.owner,
        repo: this.config.repo,
        issue_number: issueNumber,
        assignees,
        ...(agentAssignment ? { agent_assignment: toAgentAssignmentPayload(agentAssignment) } : {})
      });
      return (data.assignees ?? []).map(user => user.login);
    });
  }

  async updateIssueBody(issueNumber: number, body: string): Promise<void> {
    await this.call('updateIssueBody', async () => {
      await this.octokit.issues.update({
        owner: this.config.owner,
        repo: this.config.repo,
        issue_number: issueNumber,
        body
      });
    });
  }

  /**
   * Finds the lowest-numbered issue whose body contains the marker.
   * Search results are re-checked against the body because search matches words, not substrings.
   */
  async findIssueByBodyMarker(marker: string): Promise<IssueRecord | undefined> {
    return this.call('findIssueByBodyMarker', async () => {
      const quoted = marker.replace(/"/g, '');
      const { data } = await this.octokit.search.issuesAndPullRequests({
        q: `repo:${this.repository} is:issue in:body "${quoted}"`,
        per_page: 100
      });
      const matches = data.items
        .filter(item => !item.pull_request && (item.body ?? '').includes(marker))
        .map(toIssueRecord)
        .sort((a, b) => a.number - b.number);
      return matches[0];
    });
  }

  async listPullRequests(filter: PullRequestFilter): Promise<PullRequestSummary[]> {
    return this.call('listPullRequests', async () => {
      const pulls = await this.octokit.paginate(this.octokit.pulls.list, {
        owner: this.config.owner,
        repo: this.config.repo,
        state: filter.state,
        per_page: 100
      });
      return pulls.map(toPullRequestSummary);
    });
  }

  async getPullRequest(pullNumber: number): Promise<PullRequestDetails> {
    return this.call('getPullRequest', async () => {
      const { data } = await this.octokit.pulls.get({
        owner: this.config.owner,
        repo: this.config.repo,
        pull_number: pullNumber
      });
      return {
        ...toPullRequestSummary(data),
        mergeable: data.mergeable,
        mergeableState: data.mergeable_state || null
      };
    });
  }

  async listPullRequestReviews(pullNumber: number): Promise<PullRequestReview[]> {
    return this.call('listPullRequestReviews', async () => {
      const reviews = await this.octokit.paginate(this.octokit.pulls.listReviews, {
        owner: this.config.owner,
        repo: this.config.repo,
        pull_number: pullNumber,
        per_page: 100
      });
      return reviews.map(review => ({
        author: review.user?.login ?? 'unknown',
        state: review.state,
        submittedAt: review.submitted_at ? new Date(review.submitted_at) : undefined
      }));
    });
  }

  /**
   * Issue comments, submitted reviews and review comments, oldest first
   */
  async listPullRequestDiscussion(pullNumber: number): Promise<DiscussionItem[]> {
    return this.call('listPullRequestDiscussion', async () => {
      const target = { owner: this.config.owner, repo: this.config.repo, per_page: 100 };
      const [comments, reviews, reviewComments] = await Promise.all([
        this.octokit.paginate(this.octokit.issues.listComments, { ...target, issue_number: pullNumber }),
        this.octokit.paginate(this.octokit.pulls.listReviews, { ...target, pull_number: pullNumber }),
        this.octokit.paginate(this.octokit.pulls.listReviewComments, { ...target, pull_number: pullNumber })
      ]);

      const items: DiscussionItem[] = [];
      for (const comment of comments) {
        items.push({
          kind: 'ISSUE_COMMENT',
          author: comment.user?.login ?? 'unknown',
          body: comment.body ?? '',
          createdAt: new Date(comment.created_at),
          url: comment.html_url
        });
      }
      for (const review of reviews) {
        if (!review.submitted_at) {
          continue;
        }
        items.push({
          kind: 'REVIEW',
          author: review.user?.login ?? 'unknown',
          body: review.body ?? '',
          createdAt: new Date(review.submitted_at),
          url: review.html_url
        });
      }
      for (const comment of reviewComments) {
        items.push({
          kind: 'REVIEW_COMMENT',
          author: comment.user?.login ?? 'unknown',
          body: comment.body,
          createdAt: new Date(comment.created_at),
          url: comment.html_url
        });
      }

      return items.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    });
  }

  /**
   * Pull requests in this repository that mention the issue, from its timeline
   */
  async listCrossReferencedPullRequests(issueNumber: number): Promise<number[]> {
    return this.call('listCrossReferencedPullRequests', async () => {
      const events: unknown[] = await this.octokit.paginate(this.octokit.issues.listEventsForTimeline, {
        owner: this.config.owner,
        repo: this.config.repo,
        issue_number: issueNumber,
        per_page: 100
      });
      const numbers = new Set<number>();
      for (const event of events) {
        const pullNumber = crossReferencedPullNumber(event, this.repository);
        if (pullNumber !== undefined) {
          numbers.add(pullNumber);
        }
      }
      return [...numbers].sort((a, b) => a - b);
    });
  }

  async setReadyForReview(nodeId: string): Promise<void> {
    await this.call('setReadyForReview', async () => {
      await this.graphqlClient<{ markPullRequestReadyForReview: { pullRequest: { isDraft: boolean } } }>(
        `
          mutation($id: ID!) {
            markPullRequestReadyForReview(input: { pullRequestId: $id }) {
              pullRequest {
                isDraft
              }
            }
          }
        `,
        { id: nodeId }
      );
    });
  }

  /**
   * Merges a pull request. A refusal by GitHub (not mergeable, head changed,
   * conflict) is returned as `merged: false` instead of thrown.
   */
  async mergePullRequest(pullNumber: number, method: MergeMethod): Promise<MergeOutcome> {
    try {
      const { data } = await this.octokit.pulls.merge({
        owner: this.config.owner,
        repo: this.config.repo,
        pull_number: pullNumber,
        merge_method: method
      });
      return { merged: data.merged, message: data.message, sha: data.sha };
    } catch (error) {
      const status = httpStatus(error);
      if (status !== undefined && MERGE_REFUSAL_STATUSES.has(status)) {
        logger.warn('GitHub refused the merge', { pullNumber, status, message: errorMessage(error) });
        return { merged: false, message: errorMessage(error), status };
      }
      throw this.wrap('mergePullRequest', error);
    }
  }

  async deleteBranch(branch: string): Promise<void> {
    await this.call('deleteBranch', async () => {
      await this.octokit.git.deleteRef({
        owner: this.config.owner,
        repo: this.config.repo,
        ref: `heads/${branch}`
      });
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrap(operation, error);
    }
  }

  private wrap(operation: string, error: unknown): UpstreamApiError {
    const status = httpStatus(error);
    const message = errorMessage(error);
    logger.error('GitHub API call failed', error, { operation, status, repository: this.repository });
    return new UpstreamApiError(
      `GitHub ${operation} failed: ${message}`,
      operation,
      status,
      error instanceof Error ? error : undefined
    );
  }
}
