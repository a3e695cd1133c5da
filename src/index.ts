/**
 * Main entry point for the Issue Loop Engine
 *
 * LoopController wires the components together and exposes the four loop
 * operations. Each call reads the current state fresh, performs at most one
 * mutation, and reports expected conditions as typed failures. Upstream and
 * unexpected errors propagate to the caller.
 */

import { ArtifactReader } from './components/artifact-reader';
import { CapabilityUpdateTrigger } from './components/capability-update-trigger';
import { splitRepository } from './components/config-loader';
import { GapAnalysisEnsurer } from './components/gap-analysis-ensurer';
import { GitHubRepositoryClient, IssueRepository } from './components/github-repository-client';
import { MergeGate, collectMergeCandidates } from './components/merge-gate';
import { QueuePromoter } from './components/queue-promoter';
import { FileSystemQueueStore, QueueStore } from './components/queue-store';
import { classifyStage } from './components/stage-classifier';
import { LocalTemplateStore, TemplateStore } from './components/template-store';
import { GitHubTokenResolver } from './components/token-resolver';
import { logger } from './utils/logger';
import type {
  ActionFailure,
  ActionOutcome,
  ActionWarning,
  CapabilityUpdateResult,
  GapAnalysisResult,
  LoopConfig,
  MergeResult,
  PromotionResult,
  StageSnapshot
} from './types';
import {
  EmptyQueueError,
  MergeRefusedError,
  NoReadyPullRequestError,
  QueueItemError,
  TemplateCorruptedError
} from './errors';

export * from './types';
export * from './errors';
export * from './utils';
export { ConfigLoader } from './components/config-loader';
export { classifyStage } from './components/stage-classifier';
export { evaluateReadiness } from './components/merge-gate';
export { GitHubRepositoryClient } from './components/github-repository-client';
export type { IssueRepository } from './components/github-repository-client';
export { FileSystemQueueStore } from './components/queue-store';
export type { QueueStore } from './components/queue-store';
export { LocalTemplateStore } from './components/template-store';
export type { TemplateStore } from './components/template-store';

/**
 * The four loop operations, as consumed by the CLI
 */
export interface LoopOperations {
  getStageSnapshot(): Promise<ActionOutcome<StageSnapshot>>;
  ensureGapAnalysisIssue(): Promise<ActionOutcome<GapAnalysisResult>>;
  promoteNextQueueItem(): Promise<ActionOutcome<PromotionResult>>;
  mergeNextReadyPullRequest(): Promise<ActionOutcome<MergeResult>>;
}

export interface LoopDependencies {
  readonly config: LoopConfig;
  readonly repository: IssueRepository;
  readonly queueStore?: QueueStore;
  readonly templateStore?: TemplateStore;
}

/**
 * Maps the errors that stand for expected loop conditions to a failure.
 * Anything else is not a loop condition and is rethrown by the caller.
 */
export function toActionFailure(error: unknown): ActionFailure | undefined {
  if (error instanceof EmptyQueueError) {
    return { kind: 'EmptyQueue', message: error.message };
  }
  if (error instanceof NoReadyPullRequestError) {
    return {
      kind: 'NoReadyPullRequest',
      message: error.message,
      reasons: [...new Set(error.refusals.flatMap(refusal => refusal.reasons))]
    };
  }
  if (error instanceof MergeRefusedError) {
    return { kind: 'Refused', message: error.message, reasons: error.reasons, pullRequestNumber: error.prNumber };
  }
  if (error instanceof TemplateCorruptedError) {
    return { kind: 'TemplateCorrupted', message: `${error.message} (${error.problems.join('; ')})` };
  }
  if (error instanceof QueueItemError) {
    return { kind: 'InvalidQueueItem', message: error.message };
  }
  return undefined;
}

/**
 * Main controller for the issue loop
 */
export class LoopController implements LoopOperations {
  private readonly reader: ArtifactReader;
  private readonly promoter: QueuePromoter;
  private readonly ensurer: GapAnalysisEnsurer;
  private readonly gate: MergeGate;
  private readonly trigger: CapabilityUpdateTrigger;

  constructor(dependencies: LoopDependencies) {
    const { config, repository } = dependencies;
    const queueStore =
      dependencies.queueStore ??
      new FileSystemQueueStore({ pendingDir: config.pendingDir, processedDir: config.processedDir });
    const templateStore = dependencies.templateStore ?? new LocalTemplateStore(config.templatesDir);
    const actor = {
      automationAssignee: config.automationAssignee,
      agentAssignment: { targetRepo: config.repository, baseBranch: config.agentBaseBranch },
      labels: config.labels
    };

    this.reader = new ArtifactReader(queueStore, repository, config.labels);
    this.promoter = new QueuePromoter(queueStore, repository, actor);
    this.ensurer = new GapAnalysisEnsurer(repository, templateStore, actor);
    this.gate = new MergeGate(repository, {
      repository: config.repository,
      mergeMethod: config.mergeMethod,
      markReadyForReview: config.markReadyForReview,
      deleteMergedBranch: config.deleteMergedBranch
    });
    this.trigger = new CapabilityUpdateTrigger(repository, templateStore, actor);
  }

  /**
   * Builds a controller talking to GitHub, resolving the API token first
   */
  static async fromConfig(
    config: LoopConfig,
    resolver: GitHubTokenResolver = new GitHubTokenResolver()
  ): Promise<LoopController> {
    const token = await resolver.resolve({
      githubToken: config.githubToken,
      apiTokenSecretArn: config.apiTokenSecretArn,
      awsRegion: config.awsRegion
    });
    const { owner, repo } = splitRepository(config.repository);
    const repository = new GitHubRepositoryClient({ owner, repo, token, apiUrl: config.githubApiUrl });
    return new LoopController({ config, repository });
  }

  async getStageSnapshot(): Promise<ActionOutcome<StageSnapshot>> {
    return this.runAction('getStageSnapshot', async () => {
      const observation = await this.reader.observe();
      const snapshot = classifyStage(observation, this.gate.policy);
      logger.info('Stage classified', { stage: snapshot.stage, focus: snapshot.focus?.title });
      return { value: snapshot, warnings: [] };
    });
  }

  async ensureGapAnalysisIssue(): Promise<ActionOutcome<GapAnalysisResult>> {
    return this.runAction('ensureGapAnalysisIssue', async () => {
      const result = await this.ensurer.ensure();
      return { value: result, warnings: result.warnings };
    });
  }

  async promoteNextQueueItem(): Promise<ActionOutcome<PromotionResult>> {
    return this.runAction('promoteNextQueueItem', async () => {
      const result = await this.promoter.promoteNext();
      return { value: result, warnings: result.warnings };
    });
  }

  /**
   * Merges one ready PR. After a development merge the capability update
   * issue is created; if that fails the merge still stands and the failure
   * is reported as a warning.
   */
  async mergeNextReadyPullRequest(): Promise<ActionOutcome<MergeResult>> {
    return this.runAction('mergeNextReadyPullRequest', async () => {
      const observation = await this.reader.observe();
      const candidates = collectMergeCandidates(observation.openIssues, observation.openPullRequests);
      const merged = await this.gate.mergeIfReady(candidates);
      const warnings: ActionWarning[] = [...merged.warnings];

      let capabilityUpdate: CapabilityUpdateResult | undefined;
      if (merged.candidate.category === 'development') {
        try {
          capabilityUpdate = await this.trigger.onMerge(merged.candidate.pullRequest);
          warnings.push(...capabilityUpdate.warnings);
        } catch (error) {
          logger.error('Capability update trigger failed after merge', error, {
            pullNumber: merged.candidate.pullRequest.number
          });
          warnings.push({
            code: 'CAPABILITY_UPDATE_FAILED',
            message: `PR #${merged.candidate.pullRequest.number} merged but the capability update issue was not created: ${
              error instanceof Error ? error.message : String(error)
            }`
          });
        }
      }

      const result: MergeResult = {
        pullRequestNumber: merged.candidate.pullRequest.number,
        pullRequestUrl: merged.candidate.pullRequest.url,
        category: merged.candidate.category,
        issueNumber: merged.candidate.issueNumber,
        sha: merged.sha,
        branchDeleted: merged.branchDeleted,
        capabilityUpdate,
        warnings
      };
      return { value: result, warnings };
    });
  }

  private async runAction<T>(
    operation: string,
    action: () => Promise<{ value: T; warnings: ActionWarning[] }>
  ): Promise<ActionOutcome<T>> {
    try {
      const { value, warnings } = await action();
      return { ok: true, value, warnings };
    } catch (error) {
      const failure = toActionFailure(error);
      if (!failure) {
        throw error;
      }
      logger.info('Loop action ended without a change', { operation, kind: failure.kind, message: failure.message });
      return { ok: false, failure };
    }
  }
}
