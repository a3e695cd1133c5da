/**
 * Configuration types for the issue loop engine
 */

import type { MergeMethod } from './pull-request';

export type Environment = 'development' | 'test' | 'staging' | 'production';

export interface LabelConfig {
  readonly gapAnalysis: string;
  readonly capabilityUpdate: string;
  readonly development: string;
}

export interface LoopConfig {
  readonly environment: Environment;
  readonly repository: string;
  readonly githubToken?: string;
  readonly apiTokenSecretArn?: string;
  readonly githubApiUrl: string;
  readonly awsRegion: string;
  readonly automationAssignee: string;
  /** Base branch sent with a Copilot assignment; the repository default when unset */
  readonly agentBaseBranch?: string;
  readonly pendingDir: string;
  readonly processedDir: string;
  readonly templatesDir: string;
  readonly mergeMethod: MergeMethod;
  readonly markReadyForReview: boolean;
  readonly deleteMergedBranch: boolean;
  readonly labels: LabelConfig;
}
