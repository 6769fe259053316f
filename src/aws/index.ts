/**
 * AWS SDK client construction.
 *
 * Builds the IAM, Redshift and Secrets Manager clients used by one command,
 * all sharing the region and credential source from the configuration.
 * @module dwh-provisioner/aws
 */

import { IAMClient, type IAMClientConfig } from '@aws-sdk/client-iam';
import { RedshiftClient } from '@aws-sdk/client-redshift';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { fromIni } from '@aws-sdk/credential-providers';

import type { AwsConfig, AwsCredentialSource } from '../config/index.js';

type ClientCredentials = IAMClientConfig['credentials'];

/**
 * SDK clients for one command run.
 */
export interface AwsClients {
  iam: IAMClient;
  redshift: RedshiftClient;
  secretsManager: SecretsManagerClient;
  /** Releases the clients' HTTP sockets */
  destroy(): void;
}

/**
 * Maps a configured credential source onto the SDK's credentials option.
 * Returns undefined for the default provider chain.
 */
export function resolveCredentials(source: AwsCredentialSource): ClientCredentials {
  switch (source.type) {
    case 'static':
      return {
        accessKeyId: source.accessKeyId,
        secretAccessKey: source.secretAccessKey,
        sessionToken: source.sessionToken,
      };
    case 'profile':
      return fromIni({ profile: source.profileName });
    case 'default':
      // AWS SDK resolves environment, shared files and instance metadata itself
      return undefined;
  }
}

/**
 * Creates the SDK clients for the configured account and region.
 */
export function createAwsClients(config: AwsConfig): AwsClients {
  const credentials = resolveCredentials(config.credentials);
  const clientConfig = credentials ? { region: config.region, credentials } : { region: config.region };

  const iam = new IAMClient(clientConfig);
  const redshift = new RedshiftClient(clientConfig);
  const secretsManager = new SecretsManagerClient(clientConfig);

  return {
    iam,
    redshift,
    secretsManager,
    destroy() {
      iam.destroy();
      redshift.destroy();
      secretsManager.destroy();
    },
  };
}
