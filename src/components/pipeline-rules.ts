/**
 * Pipeline Rules
 *
 * The fixed tables that drive the loop: how issues are categorised, which
 * stage wins when several apply, and in which order ready pull requests merge.
 * The stage order and the merge order differ on purpose. A ready capability
 * PR merges before a ready gap-analysis PR, while the stage reports the gap
 * analysis first because it gates all other work.
 */

import type {
  Issue,
  IssueCategory,
  IssueRecord,
  LabelConfig,
  PullRequest,
  QueueItem,
  Stage,
  StageFocus
} from '../types';
import { STAGES } from '../types';
import { compareQueueItems } from './queue-store';

export const GAP_ANALYSIS_TITLE = 'Identify the next most important development gap';
export const CAPABILITY_UPDATE_TITLE_PREFIX = 'Update system capabilities based on merged PR';

export function capabilityUpdateTitle(pullNumber: number): string {
  return `${CAPABILITY_UPDATE_TITLE_PREFIX} #${pullNumber}`;
}

/**
 * Loop category of an issue. Labels win; titles cover issues created before
 * labels were applied. Issues without either marker are not part of the loop.
 */
export function categorizeIssue(issue: IssueRecord, labels: LabelConfig): IssueCategory | undefined {
  const names = new Set(issue.labels.map(label => label.trim().toLowerCase()));

  if (names.has(labels.gapAnalysis.toLowerCase())) {
    return 'gapAnalysis';
  }
  if (names.has(labels.capabilityUpdate.toLowerCase())) {
    return 'capability';
  }
  if (names.has(labels.development.toLowerCase())) {
    return 'development';
  }

  const title = issue.title.trim();
  if (title.toLowerCase() === GAP_ANALYSIS_TITLE.toLowerCase()) {
    return 'gapAnalysis';
  }
  if (title.startsWith(CAPABILITY_UPDATE_TITLE_PREFIX)) {
    return 'capability';
  }
  return undefined;
}

export function categoryLabel(category: IssueCategory, labels: LabelConfig): string {
  switch (category) {
    case 'gapAnalysis':
      return labels.gapAnalysis;
    case 'capability':
      return labels.capabilityUpdate;
    case 'development':
      return labels.development;
  }
}

export const STAGE_LABELS: Record<Stage, string> = {
  GAP_ISSUE: 'Gap analysis issue',
  GAP_EXECUTION: 'Gap analysis in progress',
  GAP_MERGE: 'Gap analysis merge',
  DEV_ISSUE_CREATION: 'Development issue creation',
  DEV_EXECUTION: 'Development in progress',
  DEV_MERGE: 'Development merge',
  CAP_ISSUE: 'Capability update issue',
  CAP_EXECUTION: 'Capability update in progress',
  CAP_MERGE: 'Capability update merge'
};

export function stageStep(stage: Stage): number {
  return STAGES.indexOf(stage);
}

/**
 * Categories in the order their ready pull requests are merged
 */
export const MERGE_PRIORITY: readonly IssueCategory[] = ['capability', 'gapAnalysis', 'development'];

export function mergeRank(category: IssueCategory): number {
  return MERGE_PRIORITY.indexOf(category);
}

export type WorkCategory = Exclude<IssueCategory, 'gapAnalysis'>;

/**
 * Work categories in the order the stage rules consider them. Queue
 * promotion follows the same order.
 */
export const WORK_PRIORITY: readonly WorkCategory[] = ['capability', 'development'];

const WORK_STAGES: Record<WorkCategory, { merge: Stage; execution: Stage; issue: Stage }> = {
  capability: { merge: 'CAP_MERGE', execution: 'CAP_EXECUTION', issue: 'CAP_ISSUE' },
  development: { merge: 'DEV_MERGE', execution: 'DEV_EXECUTION', issue: 'DEV_ISSUE_CREATION' }
};

/**
 * Oldest pending item of the first work category that has one
 */
export function selectNextQueueItem(items: QueueItem[]): QueueItem | undefined {
  for (const category of WORK_PRIORITY) {
    const next = items.filter(item => item.category === category).sort(compareQueueItems)[0];
    if (next) {
      return next;
    }
  }
  return undefined;
}

export interface LinkedWork {
  readonly issue: Issue;
  readonly pullRequest: PullRequest;
}

/**
 * State of one work category (development or capability) as the rules see it
 */
export interface CategoryFacts {
  /** Ready PR with the lowest number */
  readonly ready?: LinkedWork;
  /** Open issue with the lowest number, with its open PR if any */
  readonly inProgress?: { readonly issue: Issue; readonly pullRequest?: PullRequest };
  /** Oldest queue file of this category */
  readonly pending?: QueueItem;
}

export interface PipelineFacts {
  readonly gapIssue?: Issue;
  readonly gapPullRequest?: PullRequest;
  readonly gapReady: boolean;
  readonly capability: CategoryFacts;
  readonly development: CategoryFacts;
}

export interface StageRule {
  readonly stage: Stage;
  readonly applies: (facts: PipelineFacts) => boolean;
  readonly focus: (facts: PipelineFacts) => StageFocus | undefined;
}

export function issueFocus(issue: Issue, pullRequest?: PullRequest): StageFocus {
  if (pullRequest) {
    return pullRequestFocus({ issue, pullRequest });
  }
  return {
    kind: 'issue',
    title: issue.title,
    issueNumber: issue.number,
    issueUrl: issue.url
  };
}

export function pullRequestFocus(work: LinkedWork): StageFocus {
  return {
    kind: 'pullRequest',
    title: work.pullRequest.title,
    issueNumber: work.issue.number,
    issueUrl: work.issue.url,
    pullRequestNumber: work.pullRequest.number,
    pullRequestUrl: work.pullRequest.url
  };
}

export function queueFocus(item: QueueItem): StageFocus {
  return { kind: 'queueItem', title: item.name, queuePath: item.path };
}

function categoryRules(
  select: (facts: PipelineFacts) => CategoryFacts,
  stages: { merge: Stage; execution: Stage; issue: Stage }
): StageRule[] {
  return [
    {
      stage: stages.merge,
      applies: facts => select(facts).ready !== undefined,
      focus: facts => {
        const ready = select(facts).ready;
        return ready ? pullRequestFocus(ready) : undefined;
      }
    },
    {
      stage: stages.execution,
      applies: facts => select(facts).inProgress !== undefined,
      focus: facts => {
        const work = select(facts).inProgress;
        return work ? issueFocus(work.issue, work.pullRequest) : undefined;
      }
    },
    {
      stage: stages.issue,
      applies: facts => select(facts).pending !== undefined,
      focus: facts => {
        const pending = select(facts).pending;
        return pending ? queueFocus(pending) : undefined;
      }
    }
  ];
}

/**
 * Ordered predicate to stage list; the first rule that applies wins
 */
export const STAGE_RULES: readonly StageRule[] = [
  {
    stage: 'GAP_ISSUE',
    applies: facts => facts.gapIssue === undefined,
    focus: () => undefined
  },
  {
    stage: 'GAP_MERGE',
    applies: facts => facts.gapReady,
    focus: facts =>
      facts.gapIssue && facts.gapPullRequest
        ? pullRequestFocus({ issue: facts.gapIssue, pullRequest: facts.gapPullRequest })
        : undefined
  },
  {
    stage: 'GAP_EXECUTION',
    applies: facts => facts.gapPullRequest !== undefined,
    focus: facts => (facts.gapIssue ? issueFocus(facts.gapIssue, facts.gapPullRequest) : undefined)
  },
  ...WORK_PRIORITY.flatMap(category => categoryRules(facts => facts[category], WORK_STAGES[category])),
  {
    stage: 'GAP_EXECUTION',
    applies: () => true,
    focus: facts => (facts.gapIssue ? issueFocus(facts.gapIssue) : undefined)
  }
];
