/**
 * Artifact Reader Component
 *
 * Reads the queue directory and the repository's open issues and pull
 * requests, and assembles the observation the stage classifier works on.
 * Read-only: nothing here mutates the queue or GitHub.
 */

import type {
  Issue,
  IssueRecord,
  LabelConfig,
  PipelineObservation,
  PullRequest,
  PullRequestDetails,
  PullRequestReview
} from '../types';
import { logger } from '../utils/logger';
import type { IssueRepository } from './github-repository-client';
import type { QueueStore } from './queue-store';
import { categorizeIssue } from './pipeline-rules';

const CLOSING_REFERENCE = /\b(?:close[sd]?|fix(?:e[sd])?|resolve[sd]?)\s*:?\s+#(\d+)\b/i;

/**
 * Issue number named by the first closing keyword (`Fixes #12`) in a PR body
 */
export function parseClosingReference(body: string): number | undefined {
  const match = CLOSING_REFERENCE.exec(body);
  return match ? Number(match[1]) : undefined;
}

export function isConflicted(details: PullRequestDetails): boolean {
  return details.mergeable === false || details.mergeableState === 'dirty';
}

/**
 * Whether submitted reviews stand in for a cleared review request. GitHub
 * drops a reviewer from the request list once they submit a review, so an
 * approval is the only trace left of the request. Each reviewer's latest
 * approving or blocking review counts; comments alone do not.
 */
export function reviewsAttestRequest(reviews: PullRequestReview[]): boolean {
  const latest = new Map<string, PullRequestReview>();
  const submitted = reviews
    .filter(review => review.submittedAt !== undefined && review.state !== 'COMMENTED' && review.state !== 'PENDING')
    .sort((a, b) => (a.submittedAt?.getTime() ?? 0) - (b.submittedAt?.getTime() ?? 0));

  for (const review of submitted) {
    latest.set(review.author.toLowerCase(), review);
  }

  return latest.size > 0 && [...latest.values()].every(review => review.state === 'APPROVED');
}

export class ArtifactReader {
  private readonly queueStore: QueueStore;
  private readonly repository: IssueRepository;
  private readonly labels: LabelConfig;

  constructor(queueStore: QueueStore, repository: IssueRepository, labels: LabelConfig) {
    this.queueStore = queueStore;
    this.repository = repository;
    this.labels = labels;
  }

  async observe(now: Date = new Date()): Promise<PipelineObservation> {
    const items = await this.queueStore.listPending();
    const pendingItems = items.filter(item => item.category !== 'excluded');
    const processedCount = await this.queueStore.countProcessed();
    const latest = await this.queueStore.latestProcessed();

    const records = await this.repository.listIssues({ state: 'open' });
    const loopIssues = this.categorize(records);

    const pullRequests = await this.readOpenPullRequests();
    const linked = await this.linkByCrossReference(loopIssues, pullRequests);
    const openIssues = loopIssues.map(issue => this.withLinkedPullRequest(issue, linked));

    logger.debug('Pipeline observed', {
      pending: pendingItems.length,
      excluded: items.length - pendingItems.length,
      openIssues: openIssues.length,
      openPullRequests: linked.length
    });

    return {
      pendingItems,
      excludedCount: items.length - pendingItems.length,
      processedCount,
      latestProcessed: latest ? { name: latest.name, movedAt: latest.movedAt } : undefined,
      openIssues,
      openPullRequests: linked,
      observedAt: now
    };
  }

  private categorize(records: IssueRecord[]): Issue[] {
    const issues: Issue[] = [];
    for (const record of records) {
      const category = categorizeIssue(record, this.labels);
      if (category) {
        issues.push({ ...record, category, isGapAnalysis: category === 'gapAnalysis' });
      }
    }
    return issues.sort((a, b) => a.number - b.number);
  }

  private async readOpenPullRequests(): Promise<PullRequest[]> {
    const summaries = await this.repository.listPullRequests({ state: 'open' });
    const pullRequests: PullRequest[] = [];

    for (const summary of [...summaries].sort((a, b) => a.number - b.number)) {
      const details = await this.repository.getPullRequest(summary.number);
      let hasReviewRequested = details.requestedReviewerCount > 0;
      if (!hasReviewRequested) {
        hasReviewRequested = reviewsAttestRequest(await this.repository.listPullRequestReviews(summary.number));
      }

      pullRequests.push({
        number: details.number,
        title: details.title,
        body: details.body,
        url: details.url,
        state: details.state,
        isDraft: details.isDraft,
        hasReviewRequested,
        isConflicted: isConflicted(details),
        baseBranch: details.baseBranch,
        headBranch: details.headBranch,
        headRepository: details.headRepository,
        sourceIssueNumber: parseClosingReference(details.body),
        nodeId: details.nodeId
      });
    }

    return pullRequests;
  }

  /**
   * Links PRs without a closing keyword to loop issues through timeline cross-references
   */
  private async linkByCrossReference(issues: Issue[], pullRequests: PullRequest[]): Promise<PullRequest[]> {
    const unlinked = new Set(pullRequests.filter(pull => pull.sourceIssueNumber === undefined).map(pull => pull.number));
    if (unlinked.size === 0) {
      return pullRequests;
    }

    const claimed = new Set(pullRequests.map(pull => pull.sourceIssueNumber));
    const assignments = new Map<number, number>();

    for (const issue of issues) {
      if (claimed.has(issue.number)) {
        continue;
      }
      const referenced = await this.repository.listCrossReferencedPullRequests(issue.number);
      const pullNumber = referenced.find(number => unlinked.has(number) && !assignments.has(number));
      if (pullNumber !== undefined) {
        assignments.set(pullNumber, issue.number);
      }
    }

    return pullRequests.map(pull => {
      const issueNumber = assignments.get(pull.number);
      return issueNumber === undefined ? pull : { ...pull, sourceIssueNumber: issueNumber };
    });
  }

  private withLinkedPullRequest(issue: Issue, pullRequests: PullRequest[]): Issue {
    const pull = pullRequests.find(candidate => candidate.sourceIssueNumber === issue.number);
    return pull ? { ...issue, linkedPullRequest: { number: pull.number, url: pull.url } } : issue;
  }
}
