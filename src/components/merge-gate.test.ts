/**
 * Unit tests for MergeGate
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  MergeGate,
  collectMergeCandidates,
  compareCandidates,
  evaluateReadiness,
  isWorkInProgress,
  shouldDeleteBranch
} from './merge-gate';
import { MergeRefusedError, NoReadyPullRequestError, UpstreamApiError } from '../errors';
import type { MergeCandidate, PullRequest } from '../types';
import { InMemoryIssueRepository } from '../testing/in-memory-issue-repository';
import { makeIssue, makePullRequest } from '../testing/fixtures';

vi.mock('../utils/logger');

const strict = { allowDraftFlip: false };

function candidate(pullRequest: PullRequest, category: MergeCandidate['category'], issueNumber = 1): MergeCandidate {
  return { pullRequest, category, issueNumber };
}

describe('evaluateReadiness', () => {
  it('should accept an open, reviewed, conflict-free PR', () => {
    expect(evaluateReadiness(makePullRequest({ number: 5 }), strict)).toEqual({ ready: true, reasons: [] });
  });

  it('should report every failing condition', () => {
    const pull = makePullRequest({
      number: 5,
      state: 'closed',
      isDraft: true,
      title: '[WIP] Add retry logic',
      hasReviewRequested: false,
      isConflicted: true
    });

    expect(evaluateReadiness(pull, strict).reasons).toEqual([
      'NOT_OPEN',
      'IS_DRAFT',
      'WORK_IN_PROGRESS',
      'REVIEW_NOT_REQUESTED',
      'MERGE_CONFLICT'
    ]);
  });

  it('should treat a draft as ready when it can be flipped', () => {
    expect(evaluateReadiness(makePullRequest({ number: 5, isDraft: true }), { allowDraftFlip: true }).ready).toBe(
      true
    );
  });

  it('should never call a PR without review request ready', () => {
    const pull = makePullRequest({ number: 5, hasReviewRequested: false });

    expect(evaluateReadiness(pull, { allowDraftFlip: true })).toEqual({
      ready: false,
      reasons: ['REVIEW_NOT_REQUESTED']
    });
  });
});

describe('isWorkInProgress', () => {
  it.each([
    ['[WIP] Add retry logic', ''],
    ['WIP: add retry logic', ''],
    ['Add retry logic (work in progress)', ''],
    ['Add retry logic', 'Still [wip], do not merge']
  ])('should flag title %j with body %j', (title, body) => {
    expect(isWorkInProgress(makePullRequest({ number: 1, title, body }))).toBe(true);
  });

  it('should not flag words that merely start with wip', () => {
    expect(isWorkInProgress(makePullRequest({ number: 1, title: 'Wipe stale caches' }))).toBe(false);
  });
});

describe('candidate selection', () => {
  it('should only consider open PRs that close a loop issue', () => {
    const issues = [makeIssue({ number: 10 }), makeIssue({ number: 11, category: 'capability' })];
    const pulls = [
      makePullRequest({ number: 1, sourceIssueNumber: 10 }),
      makePullRequest({ number: 2, sourceIssueNumber: 99 }),
      makePullRequest({ number: 3 }),
      makePullRequest({ number: 4, sourceIssueNumber: 11 })
    ];

    expect(collectMergeCandidates(issues, pulls)).toEqual([
      { pullRequest: pulls[0], category: 'development', issueNumber: 10 },
      { pullRequest: pulls[3], category: 'capability', issueNumber: 11 }
    ]);
  });

  it('should sort capability, gap analysis, development, then by PR number', () => {
    const sorted = [
      candidate(makePullRequest({ number: 1 }), 'development'),
      candidate(makePullRequest({ number: 9 }), 'gapAnalysis'),
      candidate(makePullRequest({ number: 7 }), 'capability'),
      candidate(makePullRequest({ number: 3 }), 'capability')
    ].sort(compareCandidates);

    expect(sorted.map(item => item.pullRequest.number)).toEqual([3, 7, 9, 1]);
  });
});

describe('shouldDeleteBranch', () => {
  it('should delete feature branches of the same repository', () => {
    expect(shouldDeleteBranch(makePullRequest({ number: 1 }), 'acme/widgets')).toBe(true);
  });

  it('should keep fork, main, master and base branches', () => {
    expect(shouldDeleteBranch(makePullRequest({ number: 1, headRepository: 'someone/widgets' }), 'acme/widgets')).toBe(
      false
    );
    expect(shouldDeleteBranch(makePullRequest({ number: 1, headBranch: 'main', baseBranch: 'release' }), 'acme/widgets')).toBe(false);
    expect(shouldDeleteBranch(makePullRequest({ number: 1, headBranch: 'master' }), 'acme/widgets')).toBe(false);
    expect(shouldDeleteBranch(makePullRequest({ number: 1, headBranch: 'develop', baseBranch: 'develop' }), 'acme/widgets')).toBe(false);
  });
});

describe('MergeGate', () => {
  let repository: InMemoryIssueRepository;
  let gate: MergeGate;

  const options = {
    repository: 'acme/widgets',
    mergeMethod: 'squash' as const,
    markReadyForReview: true,
    deleteMergedBranch: true
  };

  beforeEach(() => {
    repository = new InMemoryIssueRepository();
    gate = new MergeGate(repository, options);
  });

  it('should merge the highest-priority ready candidate only', async () => {
    repository.addPullRequest({ number: 5 });
    repository.addPullRequest({ number: 8 });
    const candidates = [
      candidate(makePullRequest({ number: 5 }), 'development', 123),
      candidate(makePullRequest({ number: 8 }), 'capability', 124)
    ];

    const result = await gate.mergeIfReady(candidates);

    expect(result.candidate.pullRequest.number).toBe(8);
    expect(result.sha).toBe('sha-8-1');
    expect(result.branchDeleted).toBe(true);
    expect(result.warnings).toEqual([]);
    expect(repository.merges).toEqual([{ pullNumber: 8, method: 'squash' }]);
    expect(repository.deletedBranches).toEqual(['feature-8']);
  });

  it('should leave the sha unset when GitHub reports none', async () => {
    repository.addPullRequest({ number: 5 });
    repository.mergeOutcomes.set(5, { merged: true, message: 'Pull Request successfully merged' });

    const result = await gate.mergeIfReady([candidate(makePullRequest({ number: 5 }), 'development')]);

    expect(result.candidate.pullRequest.number).toBe(5);
    expect(result.sha).toBeUndefined();
  });

  it('should throw NoReadyPullRequestError with the refusal reasons', async () => {
    const candidates = [candidate(makePullRequest({ number: 5, hasReviewRequested: false }), 'development')];

    try {
      await gate.mergeIfReady(candidates);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(NoReadyPullRequestError);
      if (error instanceof NoReadyPullRequestError) {
        expect(error.refusals).toEqual([{ pullRequestNumber: 5, reasons: ['REVIEW_NOT_REQUESTED'] }]);
      }
    }
    expect(repository.merges).toEqual([]);
  });

  it('should flip a draft to ready before merging', async () => {
    repository.addPullRequest({ number: 5, isDraft: true });

    await gate.mergeIfReady([candidate(makePullRequest({ number: 5, isDraft: true }), 'development')]);

    expect(repository.readyForReview).toEqual(['PR_node5']);
    expect(repository.merges).toHaveLength(1);
  });

  it('should refuse a draft whose flip fails', async () => {
    vi.spyOn(repository, 'setReadyForReview').mockRejectedValue(
      new UpstreamApiError('GitHub setReadyForReview failed', 'setReadyForReview', 403)
    );

    try {
      await gate.mergeIfReady([candidate(makePullRequest({ number: 5, isDraft: true }), 'development')]);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(MergeRefusedError);
      if (error instanceof MergeRefusedError) {
        expect(error.reasons).toEqual(['IS_DRAFT']);
      }
    }
    expect(repository.merges).toEqual([]);
  });

  it('should not treat drafts as ready when flipping is disabled', async () => {
    gate = new MergeGate(repository, { ...options, markReadyForReview: false });

    await expect(
      gate.mergeIfReady([candidate(makePullRequest({ number: 5, isDraft: true }), 'development')])
    ).rejects.toThrow(NoReadyPullRequestError);
  });

  it('should map a 409 refusal to MERGE_CONFLICT', async () => {
    repository.addPullRequest({ number: 5 });
    repository.mergeOutcomes.set(5, { merged: false, message: 'Head branch was modified', status: 409 });

    await expect(gate.mergeIfReady([candidate(makePullRequest({ number: 5 }), 'development')])).rejects.toMatchObject({
      name: 'MergeRefusedError',
      reasons: ['MERGE_CONFLICT']
    });
  });

  it('should map other refusals to NOT_MERGEABLE', async () => {
    repository.addPullRequest({ number: 5 });
    repository.mergeOutcomes.set(5, { merged: false, message: 'Pull Request is not mergeable', status: 405 });

    await expect(gate.mergeIfReady([candidate(makePullRequest({ number: 5 }), 'development')])).rejects.toMatchObject({
      reasons: ['NOT_MERGEABLE']
    });
  });

  it('should keep the merge and warn when branch deletion fails', async () => {
    repository.addPullRequest({ number: 5 });
    vi.spyOn(repository, 'deleteBranch').mockRejectedValue(
      new UpstreamApiError('GitHub deleteBranch failed: Reference does not exist', 'deleteBranch', 422)
    );

    const result = await gate.mergeIfReady([candidate(makePullRequest({ number: 5 }), 'development')]);

    expect(result.branchDeleted).toBe(false);
    expect(result.warnings).toEqual([
      {
        code: 'BRANCH_DELETE_FAILED',
        message: 'Branch feature-5 was not deleted: GitHub deleteBranch failed: Reference does not exist'
      }
    ]);
    expect(repository.merges).toHaveLength(1);
  });

  it('should skip branch deletion for forks', async () => {
    repository.addPullRequest({ number: 5, headRepository: 'someone/widgets' });

    const result = await gate.mergeIfReady([
      candidate(makePullRequest({ number: 5, headRepository: 'someone/widgets' }), 'development')
    ]);

    expect(result.branchDeleted).toBe(false);
    expect(repository.deletedBranches).toEqual([]);
  });
});
