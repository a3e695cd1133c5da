#!/usr/bin/env node
/**
 * CLI entry point for the Issue Loop Engine
 *
 * Runs one loop operation per invocation and prints its outcome as JSON on
 * stdout. Logs go to stderr.
 *
 * Exit codes:
 * - 0: Success
 * - 1: Upstream or unexpected failure
 * - 2: Configuration or usage error
 * - 4: Refused, template corrupted or invalid queue item
 * - 5: Nothing to do (empty queue, no ready pull request)
 */

import { ConfigLoader } from './components/config-loader';
import { LoopController, type LoopOperations } from './index';
import { ValidationError } from './errors';
import { logger } from './utils/logger';
import { sanitizeForLogging } from './utils/sanitize';
import type { ActionOutcome, FailureKind, LoopConfig } from './types';

export const COMMANDS = ['stage', 'ensure-gap-issue', 'promote-next', 'merge-ready'] as const;

export type CommandName = (typeof COMMANDS)[number];

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;
export const EXIT_REFUSED = 4;
export const EXIT_NOTHING_TO_DO = 5;

export interface CliDependencies {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly createController: (config: LoopConfig) => Promise<LoopOperations>;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

const defaultDependencies: CliDependencies = {
  env: process.env,
  cwd: process.cwd(),
  createController: config => LoopController.fromConfig(config),
  stdout: text => console.log(text),
  stderr: text => console.error(text)
};

export function isCommandName(value: string | undefined): value is CommandName {
  return COMMANDS.some(command => command === value);
}

export function exitCodeForFailure(kind: FailureKind): number {
  switch (kind) {
    case 'EmptyQueue':
    case 'NoReadyPullRequest':
      return EXIT_NOTHING_TO_DO;
    case 'Refused':
    case 'TemplateCorrupted':
    case 'InvalidQueueItem':
      return EXIT_REFUSED;
  }
}

export function usage(): string {
  return [
    'Usage: issue-loop <command>',
    '',
    'Commands:',
    '  stage             Print the current pipeline stage snapshot',
    '  ensure-gap-issue  Make sure one gap analysis issue is open',
    '  promote-next      Turn the oldest pending queue item into an issue',
    '  merge-ready       Merge the highest-priority ready pull request',
    '',
    'Required environment variables:',
    '  - GITHUB_REPOSITORY: owner/repo',
    '  - GITHUB_TOKEN or API_TOKEN_SECRET_ARN: GitHub API token, directly or from Secrets Manager',
    '',
    'Optional environment variables:',
    '  - GITHUB_API_URL, AWS_REGION, ENVIRONMENT, LOG_LEVEL',
    '  - AUTOMATION_ASSIGNEE (default: copilot-swe-agent)',
    '  - QUEUE_ROOT (default: planning/issue_queue), TEMPLATES_DIR',
    '  - MERGE_METHOD (merge, squash, rebase; default: squash)',
    '  - MARK_READY_FOR_REVIEW, DELETE_MERGED_BRANCH (default: true)',
    '  - GAP_ANALYSIS_LABEL, CAPABILITY_UPDATE_LABEL, DEVELOPMENT_LABEL'
  ].join('\n');
}

async function dispatch(command: CommandName, controller: LoopOperations): Promise<ActionOutcome<unknown>> {
  switch (command) {
    case 'stage':
      return controller.getStageSnapshot();
    case 'ensure-gap-issue':
      return controller.ensureGapAnalysisIssue();
    case 'promote-next':
      return controller.promoteNextQueueItem();
    case 'merge-ready':
      return controller.mergeNextReadyPullRequest();
  }
}

/**
 * Runs one command and returns the process exit code
 */
export async function run(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const command = argv[0];

  if (!isCommandName(command)) {
    deps.stderr(command ? `ERROR: Unknown command: ${command}\n\n${usage()}` : usage());
    return EXIT_CONFIGURATION;
  }

  try {
    const config = new ConfigLoader(deps.cwd).loadConfig(deps.env);
    const controller = await deps.createController(config);

    logger.info('Running loop command', { command, repository: config.repository });
    const outcome = await dispatch(command, controller);
    deps.stdout(JSON.stringify(outcome, null, 2));

    if (outcome.ok) {
      return EXIT_SUCCESS;
    }
    logger.info('Loop command finished without a change', { command, kind: outcome.failure.kind });
    return exitCodeForFailure(outcome.failure.kind);
  } catch (error) {
    if (error instanceof ValidationError) {
      deps.stdout(
        JSON.stringify({ ok: false, error: { kind: 'Configuration', message: error.message, problems: error.problems } }, null, 2)
      );
      deps.stderr(`ERROR: ${error.message}\n${error.problems.map(problem => `  - ${problem}`).join('\n')}`);
      return EXIT_CONFIGURATION;
    }

    const sanitizedError = sanitizeForLogging(error);
    logger.error('Loop command failed', undefined, { command, error: sanitizedError });
    deps.stdout(JSON.stringify({ ok: false, error: { kind: 'Failure', message: sanitizedError } }, null, 2));
    deps.stderr(`ERROR: ${sanitizedError}`);
    return EXIT_FAILURE;
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const code = await run(argv);
  process.exit(code);
}

// Execute main function only if this is the main module
if (typeof require !== 'undefined' && require.main === module) {
  process.on('unhandledRejection', reason => {
    const sanitizedError = sanitizeForLogging(reason);
    logger.error('Unhandled promise rejection', undefined, { error: sanitizedError });
    console.error(`\nFATAL ERROR: Unhandled promise rejection: ${sanitizedError}`);
    process.exit(EXIT_FAILURE);
  });

  process.on('uncaughtException', error => {
    const sanitizedError = sanitizeForLogging(error);
    logger.error('Uncaught exception', undefined, { error: sanitizedError });
    console.error(`\nFATAL ERROR: Uncaught exception: ${sanitizedError}`);
    process.exit(EXIT_FAILURE);
  });

  main().catch(error => {
    console.error('Fatal error:', sanitizeForLogging(error));
    process.exit(EXIT_FAILURE);
  });
}
