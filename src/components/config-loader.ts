/**
 * Configuration Loader - Loads and validates the loop configuration from environment variables
 */

import * as path from 'path';
import { ValidationError } from '../errors';
import type { Environment, LabelConfig, LoopConfig, MergeMethod } from '../types';
import { logger } from '../utils/logger';
import { DEFAULT_GITHUB_API_URL } from './github-repository-client';

export const DEFAULT_AUTOMATION_ASSIGNEE = 'copilot-swe-agent';
export const DEFAULT_QUEUE_ROOT = 'planning/issue_queue';
export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '../../templates');

export const DEFAULT_LABELS: LabelConfig = {
  gapAnalysis: 'Gap Analysis',
  capabilityUpdate: 'Update Capability',
  development: 'Development'
};

const ENVIRONMENTS: readonly Environment[] = ['development', 'test', 'staging', 'production'];
const MERGE_METHODS: readonly MergeMethod[] = ['merge', 'squash', 'rebase'];
const REPOSITORY_PATTERN = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some(environment => environment === value);
}

function isMergeMethod(value: string): value is MergeMethod {
  return MERGE_METHODS.some(method => method === value);
}

export function splitRepository(repository: string): { owner: string; repo: string } {
  const [owner, repo] = repository.split('/');
  return { owner, repo };
}

export class ConfigLoader {
  private readonly cwd: string;

  constructor(cwd: string = process.cwd()) {
    this.cwd = cwd;
  }

  /**
   * Load configuration from environment variables
   *
   * @throws {ValidationError} Listing every invalid or missing variable
   */
  loadConfig(env: NodeJS.ProcessEnv = process.env): LoopConfig {
    const problems: string[] = [];

    const repository = (env.GITHUB_REPOSITORY || '').trim();
    if (!repository) {
      problems.push('GITHUB_REPOSITORY is required');
    } else if (!REPOSITORY_PATTERN.test(repository)) {
      problems.push(`GITHUB_REPOSITORY must look like owner/repo, got: ${repository}`);
    }

    const githubToken = env.GITHUB_TOKEN || undefined;
    const apiTokenSecretArn = env.API_TOKEN_SECRET_ARN || undefined;
    if (!githubToken && !apiTokenSecretArn) {
      problems.push('GITHUB_TOKEN or API_TOKEN_SECRET_ARN is required');
    }

    const environment = env.ENVIRONMENT || 'development';
    if (!isEnvironment(environment)) {
      problems.push(`ENVIRONMENT must be one of: ${ENVIRONMENTS.join(', ')}`);
    }

    const mergeMethod = (env.MERGE_METHOD || 'squash').toLowerCase();
    if (!isMergeMethod(mergeMethod)) {
      problems.push(`MERGE_METHOD must be one of: ${MERGE_METHODS.join(', ')}`);
    }

    const markReadyForReview = this.parseBoolean(env, 'MARK_READY_FOR_REVIEW', true, problems);
    const deleteMergedBranch = this.parseBoolean(env, 'DELETE_MERGED_BRANCH', true, problems);

    if (problems.length > 0 || !isEnvironment(environment) || !isMergeMethod(mergeMethod)) {
      const error = new ValidationError('Configuration validation failed', problems);
      logger.error('Configuration loading failed', error, { problems });
      throw error;
    }

    const queueRoot = path.resolve(this.cwd, env.QUEUE_ROOT || DEFAULT_QUEUE_ROOT);
    const config: LoopConfig = {
      environment,
      repository,
      githubToken,
      apiTokenSecretArn,
      githubApiUrl: env.GITHUB_API_URL || DEFAULT_GITHUB_API_URL,
      awsRegion: env.AWS_REGION || 'us-east-1',
      automationAssignee: env.AUTOMATION_ASSIGNEE || DEFAULT_AUTOMATION_ASSIGNEE,
      agentBaseBranch: env.AGENT_BASE_BRANCH?.trim() || undefined,
      pendingDir: path.join(queueRoot, 'pending'),
      processedDir: path.join(queueRoot, 'processed'),
      templatesDir: env.TEMPLATES_DIR ? path.resolve(this.cwd, env.TEMPLATES_DIR) : DEFAULT_TEMPLATES_DIR,
      mergeMethod,
      markReadyForReview,
      deleteMergedBranch,
      labels: {
        gapAnalysis: env.GAP_ANALYSIS_LABEL || DEFAULT_LABELS.gapAnalysis,
        capabilityUpdate: env.CAPABILITY_UPDATE_LABEL || DEFAULT_LABELS.capabilityUpdate,
        development: env.DEVELOPMENT_LABEL || DEFAULT_LABELS.development
      }
    };

    logger.info('Configuration loaded successfully', {
      environment: config.environment,
      repository: config.repository,
      pendingDir: config.pendingDir,
      mergeMethod: config.mergeMethod
    });

    return config;
  }

  private parseBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean, problems: string[]): boolean {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(value)) {
      return true;
    }
    if (['0', 'false', 'no', 'off'].includes(value)) {
      return false;
    }
    problems.push(`${name} must be a boolean, got: ${raw}`);
    return fallback;
  }
}
