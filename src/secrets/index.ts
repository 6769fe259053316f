/**
 * Master password resolution.
 *
 * The cluster master password is either written in the configuration file
 * or kept in AWS Secrets Manager and fetched when a cluster is created.
 *
 * @module secrets
 */

import {
  GetSecretValueCommand,
  type GetSecretValueCommandInput,
  type GetSecretValueCommandOutput,
  type SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';

import type { MasterPasswordSource } from '../config/index.js';
import { SecretResolutionError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../logging/index.js';

/**
 * Secrets Manager operations used for password lookup.
 */
export interface SecretsApi {
  getSecretValue(input: GetSecretValueCommandInput): Promise<GetSecretValueCommandOutput>;
}

/**
 * Adapts an SDK Secrets Manager client to {@link SecretsApi}.
 */
export function secretsApi(client: SecretsManagerClient): SecretsApi {
  return {
    getSecretValue: (input) => client.send(new GetSecretValueCommand(input)),
  };
}

/**
 * Supplies the master password at cluster creation time.
 */
export interface PasswordSource {
  getMasterPassword(): Promise<string>;
}

/**
 * Password source backed by the configuration, fetching from Secrets
 * Manager when the configuration names a secret.
 *
 * A secret string is used as-is unless it is a JSON object, in which case
 * its `password` field is read (the layout Secrets Manager uses for
 * Redshift credentials).
 */
export class MasterPasswordResolver implements PasswordSource {
  private readonly source: MasterPasswordSource;
  private readonly api?: SecretsApi;
  private readonly logger: Logger;

  constructor(source: MasterPasswordSource, api?: SecretsApi, logger: Logger = new NoopLogger()) {
    this.source = source;
    this.api = api;
    this.logger = logger;
  }

  async getMasterPassword(): Promise<string> {
    if (this.source.type === 'literal') {
      return this.source.password;
    }

    const { secretId } = this.source;
    if (!this.api) {
      throw new SecretResolutionError(secretId, 'no Secrets Manager client configured');
    }

    this.logger.debug('Fetching master password from Secrets Manager', { secretId });

    let response: GetSecretValueCommandOutput;
    try {
      response = await this.api.getSecretValue({ SecretId: secretId });
    } catch (error) {
      throw new SecretResolutionError(
        secretId,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }

    if (!response.SecretString) {
      throw new SecretResolutionError(secretId, 'secret value is empty or binary');
    }

    return extractPassword(secretId, response.SecretString);
  }
}

/**
 * Reads the password out of a secret string.
 */
export function extractPassword(secretId: string, secretString: string): string {
  const trimmed = secretString.trim();
  if (!trimmed.startsWith('{')) {
    return secretString;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (error) {
    throw new SecretResolutionError(
      secretId,
      'secret looks like JSON but could not be parsed',
      error instanceof Error ? error : undefined
    );
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'password' in parsed &&
    typeof parsed.password === 'string' &&
    parsed.password.length > 0
  ) {
    return parsed.password;
  }

  throw new SecretResolutionError(secretId, 'secret JSON must contain a non-empty "password" field');
}
