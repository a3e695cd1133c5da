/**
 * Stage Classifier Component
 *
 * Pure mapping from a pipeline observation to exactly one stage. Nothing is
 * stored: the stage is derived again on every call.
 */

import type {
  Issue,
  PipelineObservation,
  PullRequest,
  QueueCategory,
  ReadinessPolicy,
  StageCounts,
  StageSnapshot
} from '../types';
import { compareQueueItems } from './queue-store';
import { collectMergeCandidates, evaluateReadiness } from './merge-gate';
import { CategoryFacts, PipelineFacts, STAGE_LABELS, STAGE_RULES, WorkCategory, stageStep } from './pipeline-rules';

function lowestPullRequestFor(issue: Issue, pullRequests: PullRequest[]): PullRequest | undefined {
  return pullRequests
    .filter(pull => pull.state === 'open' && pull.sourceIssueNumber === issue.number)
    .sort((a, b) => a.number - b.number)[0];
}

function categoryFacts(
  observation: PipelineObservation,
  category: WorkCategory,
  policy: ReadinessPolicy
): CategoryFacts {
  const issues = observation.openIssues
    .filter(issue => issue.category === category)
    .sort((a, b) => a.number - b.number);

  let ready: CategoryFacts['ready'];
  for (const issue of issues) {
    for (const pullRequest of observation.openPullRequests) {
      if (
        pullRequest.sourceIssueNumber === issue.number &&
        evaluateReadiness(pullRequest, policy).ready &&
        (!ready || pullRequest.number < ready.pullRequest.number)
      ) {
        ready = { issue, pullRequest };
      }
    }
  }

  const first = issues[0];
  const inProgress = first ? { issue: first, pullRequest: lowestPullRequestFor(first, observation.openPullRequests) } : undefined;

  const queueCategory: QueueCategory = category;
  const pending = observation.pendingItems
    .filter(item => item.category === queueCategory)
    .sort(compareQueueItems)[0];

  return { ready, inProgress, pending };
}

export function derivePipelineFacts(observation: PipelineObservation, policy: ReadinessPolicy): PipelineFacts {
  const gapIssue = observation.openIssues
    .filter(issue => issue.isGapAnalysis)
    .sort((a, b) => a.number - b.number)[0];
  const gapPullRequest = gapIssue ? lowestPullRequestFor(gapIssue, observation.openPullRequests) : undefined;

  return {
    gapIssue,
    gapPullRequest,
    gapReady: gapPullRequest !== undefined && evaluateReadiness(gapPullRequest, policy).ready,
    capability: categoryFacts(observation, 'capability', policy),
    development: categoryFacts(observation, 'development', policy)
  };
}

function countPending(observation: PipelineObservation, category: QueueCategory): number {
  return observation.pendingItems.filter(item => item.category === category).length;
}

function collectWarnings(observation: PipelineObservation, facts: PipelineFacts, policy: ReadinessPolicy): string[] {
  const warnings: string[] = [];

  const gapIssues = observation.openIssues.filter(issue => issue.isGapAnalysis);
  if (gapIssues.length > 1) {
    warnings.push(
      `${gapIssues.length} open gap-analysis issues (#${gapIssues.map(issue => issue.number).join(', #')}); only #${facts.gapIssue?.number} is tracked`
    );
  }

  if (facts.gapReady && facts.gapPullRequest && facts.capability.ready) {
    warnings.push(
      `Capability PR #${facts.capability.ready.pullRequest.number} merges before gap-analysis PR #${facts.gapPullRequest.number}`
    );
  }

  for (const candidate of collectMergeCandidates(observation.openIssues, observation.openPullRequests)) {
    if (evaluateReadiness(candidate.pullRequest, policy).reasons.includes('MERGE_CONFLICT')) {
      warnings.push(`PR #${candidate.pullRequest.number} has merge conflicts`);
    }
  }

  return warnings;
}

/**
 * Classifies the observation into one stage with its focus, counts and warnings
 */
export function classifyStage(observation: PipelineObservation, policy: ReadinessPolicy): StageSnapshot {
  const facts = derivePipelineFacts(observation, policy);
  const rule = STAGE_RULES.find(candidate => candidate.applies(facts)) ?? STAGE_RULES[STAGE_RULES.length - 1];

  const candidates = collectMergeCandidates(observation.openIssues, observation.openPullRequests);
  const counts: StageCounts = {
    pending: observation.pendingItems.length,
    processed: observation.processedCount,
    excluded: observation.excludedCount,
    openIssues: observation.openIssues.length,
    openPullRequests: observation.openPullRequests.length,
    readyPullRequests: candidates.filter(candidate => evaluateReadiness(candidate.pullRequest, policy).ready).length,
    openGapAnalysisIssues: observation.openIssues.filter(issue => issue.isGapAnalysis).length,
    pendingDevelopment: countPending(observation, 'development'),
    pendingCapabilityUpdates: countPending(observation, 'capability')
  };

  const latest = observation.latestProcessed;

  return {
    stage: rule.stage,
    stageLabel: STAGE_LABELS[rule.stage],
    activeStep: stageStep(rule.stage),
    focus: rule.focus(facts),
    counts,
    lastAction: latest
      ? { kind: 'QUEUE_ITEM_PROMOTED', summary: `Promoted ${latest.name}`, at: latest.movedAt.toISOString() }
      : undefined,
    warnings: collectWarnings(observation, facts, policy),
    generatedAt: observation.observedAt.toISOString()
  };
}
