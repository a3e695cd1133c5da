/**
 * Token Resolver Component
 *
 * Resolves the GitHub API token from the environment or, when only a secret
 * ARN is configured, from AWS Secrets Manager.
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { UpstreamApiError, ValidationError } from '../errors';
import { logger } from '../utils/logger';

export interface TokenSource {
  readonly githubToken?: string;
  readonly apiTokenSecretArn?: string;
  readonly awsRegion: string;
}

/**
 * Reads the token out of a secret string. JSON secrets may hold it under
 * `token` or `GITHUB_TOKEN`; anything else is used as the token itself.
 */
export function extractToken(secretString: string): string {
  const trimmed = secretString.trim();
  if (!trimmed.startsWith('{')) {
    return trimmed;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
  if (typeof parsed === 'object' && parsed !== null) {
    for (const key of ['token', 'GITHUB_TOKEN']) {
      const value: unknown = Reflect.get(parsed, key);
      if (typeof value === 'string' && value.trim()) {
        return value.trim();
      }
    }
  }
  return '';
}

export class GitHubTokenResolver {
  private readonly clientFactory: (region: string) => SecretsManagerClient;

  constructor(clientFactory: (region: string) => SecretsManagerClient = region => new SecretsManagerClient({ region })) {
    this.clientFactory = clientFactory;
  }

  /**
   * @throws {ValidationError} If no token source is configured or the secret is empty
   * @throws {UpstreamApiError} If Secrets Manager cannot be reached
   */
  async resolve(source: TokenSource): Promise<string> {
    if (source.githubToken) {
      logger.debug('Using GitHub token from environment');
      return source.githubToken;
    }

    if (!source.apiTokenSecretArn) {
      throw new ValidationError('No GitHub token configured', [
        'Set GITHUB_TOKEN or API_TOKEN_SECRET_ARN'
      ]);
    }

    logger.info('Retrieving GitHub API token from Secrets Manager', {
      secretArn: source.apiTokenSecretArn
    });

    let secretString: string | undefined;
    try {
      const response = await this.clientFactory(source.awsRegion).send(
        new GetSecretValueCommand({ SecretId: source.apiTokenSecretArn })
      );
      secretString = response.SecretString;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error('Failed to retrieve GitHub API token', error);
      throw new UpstreamApiError(
        `Failed to retrieve GitHub API token: ${errorMessage}`,
        'getSecretValue',
        undefined,
        error instanceof Error ? error : undefined
      );
    }

    const token = secretString ? extractToken(secretString) : '';
    if (!token) {
      throw new ValidationError('GitHub API token secret is empty', [
        `Secret ${source.apiTokenSecretArn} has no usable token`
      ]);
    }

    logger.info('GitHub API token retrieved successfully');
    return token;
  }
}
