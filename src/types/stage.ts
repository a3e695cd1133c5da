/**
 * Pipeline stage types
 */

import type { Issue } from './issue';
import type { PullRequest } from './pull-request';
import type { QueueItem } from './queue';

export const STAGES = [
  'GAP_ISSUE',
  'GAP_EXECUTION',
  'GAP_MERGE',
  'DEV_ISSUE_CREATION',
  'DEV_EXECUTION',
  'DEV_MERGE',
  'CAP_ISSUE',
  'CAP_EXECUTION',
  'CAP_MERGE'
] as const;

export type Stage = (typeof STAGES)[number];

export type FocusKind = 'issue' | 'pullRequest' | 'queueItem';

export interface StageFocus {
  readonly kind: FocusKind;
  readonly title: string;
  readonly issueNumber?: number;
  readonly issueUrl?: string;
  readonly pullRequestNumber?: number;
  readonly pullRequestUrl?: string;
  readonly queuePath?: string;
}

export interface StageCounts {
  readonly pending: number;
  readonly processed: number;
  readonly excluded: number;
  readonly openIssues: number;
  readonly openPullRequests: number;
  readonly readyPullRequests: number;
  readonly openGapAnalysisIssues: number;
  readonly pendingDevelopment: number;
  readonly pendingCapabilityUpdates: number;
}

export interface LastAction {
  readonly kind: 'QUEUE_ITEM_PROMOTED';
  readonly summary: string;
  readonly at: string;
}

export interface StageSnapshot {
  readonly stage: Stage;
  readonly stageLabel: string;
  readonly activeStep: number;
  readonly focus?: StageFocus;
  readonly counts: StageCounts;
  readonly lastAction?: LastAction;
  readonly warnings: string[];
  readonly generatedAt: string;
}

/**
 * Everything the classifier needs, read fresh on every call
 */
export interface PipelineObservation {
  readonly pendingItems: QueueItem[];
  readonly excludedCount: number;
  readonly processedCount: number;
  readonly latestProcessed?: { readonly name: string; readonly movedAt: Date };
  readonly openIssues: Issue[];
  readonly openPullRequests: PullRequest[];
  readonly observedAt: Date;
}
