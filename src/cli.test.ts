/**
 * Tests for CLI entry point
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { exitCodeForFailure, isCommandName, run, type CliDependencies } from './cli';
import type { LoopOperations } from './index';
import { UpstreamApiError, ValidationError } from './errors';
import type {
  ActionOutcome,
  GapAnalysisResult,
  LoopConfig,
  MergeResult,
  PromotionResult,
  StageSnapshot
} from './types';

vi.mock('./utils/logger');

const snapshot: StageSnapshot = {
  stage: 'GAP_ISSUE',
  stageLabel: 'Gap analysis issue',
  activeStep: 0,
  counts: {
    pending: 0,
    processed: 0,
    excluded: 0,
    openIssues: 0,
    openPullRequests: 0,
    readyPullRequests: 0,
    openGapAnalysisIssues: 0,
    pendingDevelopment: 0,
    pendingCapabilityUpdates: 0
  },
  warnings: [],
  generatedAt: '2025-03-01T12:00:00.000Z'
};

function stubOperations(overrides: Partial<LoopOperations> = {}): LoopOperations {
  return {
    getStageSnapshot: vi.fn(
      async (): Promise<ActionOutcome<StageSnapshot>> => ({ ok: true, value: snapshot, warnings: [] })
    ),
    ensureGapAnalysisIssue: vi.fn(
      async (): Promise<ActionOutcome<GapAnalysisResult>> => ({
        ok: false,
        failure: { kind: 'TemplateCorrupted', message: 'Gap analysis template is corrupted: gap-analysis.md' }
      })
    ),
    promoteNextQueueItem: vi.fn(
      async (): Promise<ActionOutcome<PromotionResult>> => ({
        ok: false,
        failure: { kind: 'EmptyQueue', message: 'No pending queue items to promote' }
      })
    ),
    mergeNextReadyPullRequest: vi.fn(
      async (): Promise<ActionOutcome<MergeResult>> => ({
        ok: false,
        failure: { kind: 'Refused', message: 'refused', reasons: ['NOT_MERGEABLE'], pullRequestNumber: 5 }
      })
    ),
    ...overrides
  };
}

describe('CLI Entry Point', () => {
  let stdout: string[];
  let stderr: string[];
  let operations: LoopOperations;
  let createController: CliDependencies['createController'];
  let deps: Partial<CliDependencies>;

  beforeEach(() => {
    stdout = [];
    stderr = [];
    operations = stubOperations();
    createController = vi.fn(async (_config: LoopConfig) => operations);
    deps = {
      env: { GITHUB_REPOSITORY: 'acme/widgets', GITHUB_TOKEN: 'test-secret', ENVIRONMENT: 'test' },
      cwd: '/work',
      createController,
      stdout: text => stdout.push(text),
      stderr: text => stderr.push(text)
    };
  });

  describe('isCommandName', () => {
    it('should accept the four commands only', () => {
      expect(['stage', 'ensure-gap-issue', 'promote-next', 'merge-ready'].every(isCommandName)).toBe(true);
      expect(isCommandName('merge')).toBe(false);
      expect(isCommandName(undefined)).toBe(false);
    });
  });

  describe('exitCodeForFailure', () => {
    it('should map nothing-to-do failures to 5 and refusals to 4', () => {
      expect(exitCodeForFailure('EmptyQueue')).toBe(5);
      expect(exitCodeForFailure('NoReadyPullRequest')).toBe(5);
      expect(exitCodeForFailure('Refused')).toBe(4);
      expect(exitCodeForFailure('TemplateCorrupted')).toBe(4);
      expect(exitCodeForFailure('InvalidQueueItem')).toBe(4);
    });
  });

  describe('run', () => {
    it('should print the stage snapshot as JSON and exit 0', async () => {
      const code = await run(['stage'], deps);

      expect(code).toBe(0);
      expect(JSON.parse(stdout[0])).toEqual({ ok: true, value: snapshot, warnings: [] });
      expect(operations.getStageSnapshot).toHaveBeenCalledTimes(1);
    });

    it('should pass the loaded configuration to the controller factory', async () => {
      await run(['stage'], deps);

      expect(createController).toHaveBeenCalledWith(
        expect.objectContaining({
          repository: 'acme/widgets',
          pendingDir: '/work/planning/issue_queue/pending',
          mergeMethod: 'squash'
        })
      );
    });

    it('should exit 5 when the queue is empty', async () => {
      const code = await run(['promote-next'], deps);

      expect(code).toBe(5);
      expect(JSON.parse(stdout[0])).toEqual({
        ok: false,
        failure: { kind: 'EmptyQueue', message: 'No pending queue items to promote' }
      });
    });

    it('should exit 4 when a merge is refused', async () => {
      expect(await run(['merge-ready'], deps)).toBe(4);
    });

    it('should exit 4 when the template is corrupted', async () => {
      expect(await run(['ensure-gap-issue'], deps)).toBe(4);
    });

    it('should exit 2 with usage for an unknown command', async () => {
      const code = await run(['deploy'], deps);

      expect(code).toBe(2);
      expect(stderr[0].split('\n')[0]).toBe('ERROR: Unknown command: deploy');
      expect(createController).not.toHaveBeenCalled();
    });

    it('should exit 2 and list configuration problems', async () => {
      const code = await run(['stage'], { ...deps, env: { GITHUB_TOKEN: 'test-secret' } });

      expect(code).toBe(2);
      expect(JSON.parse(stdout[0])).toEqual({
        ok: false,
        error: {
          kind: 'Configuration',
          message: 'Configuration validation failed',
          problems: ['GITHUB_REPOSITORY is required']
        }
      });
      expect(createController).not.toHaveBeenCalled();
    });

    it('should exit 2 when the token cannot be resolved', async () => {
      createController = vi.fn(async () => {
        throw new ValidationError('No GitHub token configured', ['Set GITHUB_TOKEN or API_TOKEN_SECRET_ARN']);
      });

      const code = await run(['stage'], { ...deps, createController });

      expect(code).toBe(2);
    });

    it('should exit 1 and redact tokens from upstream failures', async () => {
      operations = stubOperations({
        getStageSnapshot: vi.fn(async (): Promise<ActionOutcome<StageSnapshot>> => {
          throw new UpstreamApiError('GitHub listIssues failed: bad header token=test-secret', 'listIssues', 401);
        })
      });

      const code = await run(['stage'], deps);

      expect(code).toBe(1);
      expect(stderr).toEqual(['ERROR: UpstreamApiError: GitHub listIssues failed: bad header token=[REDACTED]']);
      expect(JSON.parse(stdout[0])).toEqual({
        ok: false,
        error: { kind: 'Failure', message: 'UpstreamApiError: GitHub listIssues failed: bad header token=[REDACTED]' }
      });
    });
  });
});
