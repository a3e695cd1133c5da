/**
 * Builders for loop records used across the tests
 */

import type { Issue, LabelConfig, LoopConfig, PipelineObservation, PullRequest, QueueItem } from '../types';

export const TEST_LABELS: LabelConfig = {
  gapAnalysis: 'Gap Analysis',
  capabilityUpdate: 'Update Capability',
  development: 'Development'
};

export function makeIssue(overrides: Partial<Issue> & { number: number }): Issue {
  const category = overrides.category ?? 'development';
  return {
    title: `Issue ${overrides.number}`,
    body: '',
    url: `https://github.com/acme/widgets/issues/${overrides.number}`,
    state: 'open',
    labels: [],
    assignees: [],
    createdAt: new Date('2025-01-01T00:00:00Z'),
    category,
    isGapAnalysis: category === 'gapAnalysis',
    ...overrides
  };
}

/** An open PR that passes every readiness check unless overridden */
export function makePullRequest(overrides: Partial<PullRequest> & { number: number }): PullRequest {
  return {
    title: `PR ${overrides.number}`,
    body: '',
    url: `https://github.com/acme/widgets/pull/${overrides.number}`,
    state: 'open',
    isDraft: false,
    hasReviewRequested: true,
    isConflicted: false,
    baseBranch: 'main',
    headBranch: `feature-${overrides.number}`,
    headRepository: 'acme/widgets',
    nodeId: `PR_node${overrides.number}`,
    ...overrides
  };
}

export function makeQueueItem(name: string, createdAt: string, category: QueueItem['category'] = 'development'): QueueItem {
  return {
    path: `/queue/pending/${name}`,
    name,
    category,
    createdAt: new Date(createdAt)
  };
}

export function makeObservation(overrides: Partial<PipelineObservation> = {}): PipelineObservation {
  return {
    pendingItems: [],
    excludedCount: 0,
    processedCount: 0,
    openIssues: [],
    openPullRequests: [],
    observedAt: new Date('2025-03-01T12:00:00Z'),
    ...overrides
  };
}

export function makeLoopConfig(overrides: Partial<LoopConfig> = {}): LoopConfig {
  return {
    environment: 'test',
    repository: 'acme/widgets',
    githubToken: 'test-secret',
    githubApiUrl: 'https://api.github.com',
    awsRegion: 'us-east-1',
    automationAssignee: 'copilot-swe-agent',
    pendingDir: '/queue/pending',
    processedDir: '/queue/processed',
    templatesDir: '/templates',
    mergeMethod: 'squash',
    markReadyForReview: true,
    deleteMergedBranch: true,
    labels: TEST_LABELS,
    ...overrides
  };
}
