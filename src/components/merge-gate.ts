/**
 * Merge Gate Component
 *
 * Decides whether a pull request may be merged and merges at most one per call.
 */

import type {
  ActionWarning,
  Issue,
  MergeCandidate,
  MergeMethod,
  PullRequest,
  Readiness,
  ReadinessPolicy,
  RefusalReason
} from '../types';
import { CandidateRefusal, MergeRefusedError, NoReadyPullRequestError, UpstreamApiError } from '../errors';
import { logger } from '../utils/logger';
import type { IssueRepository } from './github-repository-client';
import { mergeRank } from './pipeline-rules';

const WIP_TITLE_PATTERNS: readonly RegExp[] = [/\[wip\]/i, /^\s*wip\b/i, /work in progress/i];
const WIP_BODY_PATTERN = /\[wip\]/i;
const PROTECTED_BRANCHES = new Set(['main', 'master']);

export function isWorkInProgress(pullRequest: PullRequest): boolean {
  return (
    WIP_TITLE_PATTERNS.some(pattern => pattern.test(pullRequest.title)) || WIP_BODY_PATTERN.test(pullRequest.body)
  );
}

/**
 * Readiness predicate shared by the stage classifier and the merge gate.
 * Every failing condition is reported, not only the first.
 */
export function evaluateReadiness(pullRequest: PullRequest, policy: ReadinessPolicy): Readiness {
  const reasons: RefusalReason[] = [];

  if (pullRequest.state !== 'open') {
    reasons.push('NOT_OPEN');
  }
  if (pullRequest.isDraft && !policy.allowDraftFlip) {
    reasons.push('IS_DRAFT');
  }
  if (isWorkInProgress(pullRequest)) {
    reasons.push('WORK_IN_PROGRESS');
  }
  if (!pullRequest.hasReviewRequested) {
    reasons.push('REVIEW_NOT_REQUESTED');
  }
  if (pullRequest.isConflicted) {
    reasons.push('MERGE_CONFLICT');
  }

  return { ready: reasons.length === 0, reasons };
}

/**
 * Open pull requests that close an open loop issue
 */
export function collectMergeCandidates(issues: Issue[], pullRequests: PullRequest[]): MergeCandidate[] {
  const byNumber = new Map(issues.map(issue => [issue.number, issue]));
  const candidates: MergeCandidate[] = [];

  for (const pullRequest of pullRequests) {
    if (pullRequest.state !== 'open' || pullRequest.sourceIssueNumber === undefined) {
      continue;
    }
    const issue = byNumber.get(pullRequest.sourceIssueNumber);
    if (issue) {
      candidates.push({ pullRequest, category: issue.category, issueNumber: issue.number });
    }
  }

  return candidates;
}

/**
 * Capability first, then gap analysis, then development; lowest PR number within a category
 */
export function compareCandidates(a: MergeCandidate, b: MergeCandidate): number {
  return mergeRank(a.category) - mergeRank(b.category) || a.pullRequest.number - b.pullRequest.number;
}

/**
 * Whether the head branch may be deleted after a merge. Fork branches and
 * long-lived branches are left alone.
 */
export function shouldDeleteBranch(pullRequest: PullRequest, repository: string): boolean {
  if (pullRequest.headRepository.toLowerCase() !== repository.toLowerCase()) {
    return false;
  }
  const head = pullRequest.headBranch;
  return !PROTECTED_BRANCHES.has(head) && head !== pullRequest.baseBranch;
}

export interface MergeGateOptions {
  readonly repository: string;
  readonly mergeMethod: MergeMethod;
  readonly markReadyForReview: boolean;
  readonly deleteMergedBranch: boolean;
}

export interface MergeSelection {
  readonly candidate?: MergeCandidate;
  readonly refusals: CandidateRefusal[];
}

export interface MergeGateResult {
  readonly candidate: MergeCandidate;
  readonly sha?: string;
  readonly branchDeleted: boolean;
  readonly warnings: ActionWarning[];
}

export class MergeGate {
  private readonly repository: IssueRepository;
  private readonly options: MergeGateOptions;

  constructor(repository: IssueRepository, options: MergeGateOptions) {
    this.repository = repository;
    this.options = options;
  }

  get policy(): ReadinessPolicy {
    return { allowDraftFlip: this.options.markReadyForReview };
  }

  /**
   * Picks the first ready candidate in merge priority order
   */
  pickNext(candidates: MergeCandidate[]): MergeSelection {
    const refusals: CandidateRefusal[] = [];

    for (const candidate of [...candidates].sort(compareCandidates)) {
      const readiness = evaluateReadiness(candidate.pullRequest, this.policy);
      if (readiness.ready) {
        return { candidate, refusals };
      }
      refusals.push({ pullRequestNumber: candidate.pullRequest.number, reasons: readiness.reasons });
    }

    return { refusals };
  }

  /**
   * Merges the highest-priority ready candidate
   *
   * @throws {NoReadyPullRequestError} If no candidate is ready
   * @throws {MergeRefusedError} If the draft flip fails or GitHub refuses the merge
   */
  async mergeIfReady(candidates: MergeCandidate[]): Promise<MergeGateResult> {
    const { candidate, refusals } = this.pickNext(candidates);
    if (!candidate) {
      throw new NoReadyPullRequestError(
        candidates.length === 0 ? 'No open pull request is linked to a loop issue' : 'No pull request is ready to merge',
        refusals
      );
    }

    const pullRequest = candidate.pullRequest;
    logger.info('Merging pull request', {
      pullNumber: pullRequest.number,
      category: candidate.category,
      issueNumber: candidate.issueNumber
    });

    if (pullRequest.isDraft) {
      await this.flipToReady(pullRequest);
    }

    const outcome = await this.repository.mergePullRequest(pullRequest.number, this.options.mergeMethod);
    if (!outcome.merged) {
      const reason: RefusalReason = outcome.status === 409 ? 'MERGE_CONFLICT' : 'NOT_MERGEABLE';
      throw new MergeRefusedError(
        `GitHub refused to merge PR #${pullRequest.number}: ${outcome.message}`,
        pullRequest.number,
        [reason]
      );
    }

    const warnings: ActionWarning[] = [];
    const branchDeleted = await this.deleteHeadBranch(pullRequest, warnings);

    if (!outcome.sha) {
      logger.warn('Merge response carried no commit SHA', { pullNumber: pullRequest.number });
    }
    logger.info('Pull request merged', { pullNumber: pullRequest.number, sha: outcome.sha, branchDeleted });

    return { candidate, sha: outcome.sha, branchDeleted, warnings };
  }

  private async flipToReady(pullRequest: PullRequest): Promise<void> {
    if (!pullRequest.nodeId) {
      throw new MergeRefusedError(`PR #${pullRequest.number} is a draft without a node id`, pullRequest.number, [
        'IS_DRAFT'
      ]);
    }
    try {
      await this.repository.setReadyForReview(pullRequest.nodeId);
      logger.info('Draft pull request marked ready for review', { pullNumber: pullRequest.number });
    } catch (error) {
      if (!(error instanceof UpstreamApiError)) {
        throw error;
      }
      throw new MergeRefusedError(
        `PR #${pullRequest.number} is a draft and could not be marked ready for review`,
        pullRequest.number,
        ['IS_DRAFT'],
        error
      );
    }
  }

  private async deleteHeadBranch(pullRequest: PullRequest, warnings: ActionWarning[]): Promise<boolean> {
    if (!this.options.deleteMergedBranch || !shouldDeleteBranch(pullRequest, this.options.repository)) {
      return false;
    }
    try {
      await this.repository.deleteBranch(pullRequest.headBranch);
      return true;
    } catch (error) {
      if (!(error instanceof UpstreamApiError)) {
        throw error;
      }
      logger.warn('Failed to delete merged branch', { branch: pullRequest.headBranch, error: error.message });
      warnings.push({
        code: 'BRANCH_DELETE_FAILED',
        message: `Branch ${pullRequest.headBranch} was not deleted: ${error.message}`
      });
      return false;
    }
  }
}
