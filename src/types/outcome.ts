/**
 * Result types returned by the loop actions
 */

import type { IssueCategory } from './issue';
import type { RefusalReason } from './readiness';

export type WarningCode =
  | 'ASSIGNEE_UNAVAILABLE'
  | 'BRANCH_DELETE_FAILED'
  | 'CAPABILITY_UPDATE_FAILED'
  | 'DUPLICATE_GAP_ANALYSIS_ISSUE';

export interface ActionWarning {
  readonly code: WarningCode;
  readonly message: string;
}

export type FailureKind =
  | 'EmptyQueue'
  | 'NoReadyPullRequest'
  | 'Refused'
  | 'TemplateCorrupted'
  | 'InvalidQueueItem';

export interface ActionFailure {
  readonly kind: FailureKind;
  readonly message: string;
  readonly reasons?: RefusalReason[];
  readonly pullRequestNumber?: number;
}

export type ActionOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly warnings: ActionWarning[] }
  | { readonly ok: false; readonly failure: ActionFailure };

export interface PromotionResult {
  readonly issueNumber: number;
  readonly issueUrl: string;
  readonly queuePath: string;
  readonly processedPath: string;
  readonly created: boolean;
  readonly warnings: ActionWarning[];
}

export interface GapAnalysisResult {
  readonly created: boolean;
  readonly repaired: boolean;
  readonly issueNumber: number;
  readonly issueUrl: string;
  readonly warnings: ActionWarning[];
}

export interface CapabilityUpdateResult {
  readonly issueNumber: number;
  readonly issueUrl: string;
  readonly created: boolean;
  readonly warnings: ActionWarning[];
}

export interface MergeResult {
  readonly pullRequestNumber: number;
  readonly pullRequestUrl: string;
  readonly category: IssueCategory;
  readonly issueNumber: number;
  /** Merge commit SHA, when GitHub reports one */
  readonly sha?: string;
  readonly branchDeleted: boolean;
  readonly capabilityUpdate?: CapabilityUpdateResult;
  readonly warnings: ActionWarning[];
}
