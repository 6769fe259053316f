/**
 * Warehouse Provisioning Configuration
 *
 * Configuration types and builders for the cluster lifecycle controller and
 * the SQL catalog.
 * @module dwh-provisioner/config/config
 */

import type { LogLevel } from '../logging/index.js';
import { ConfigurationError, MissingConfigurationError } from '../errors/index.js';

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_CONFIG_PATH = 'dwh.cfg';
export const DEFAULT_PORT = 5439;
export const DEFAULT_POLL_INTERVAL_MS = 10000;
export const DEFAULT_POLL_MAX_ATTEMPTS = 10;
export const DEFAULT_INITIAL_DELAY_MS = 10000;
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Managed policy attached to the access role.
 */
export const S3_READ_ONLY_POLICY_ARN = 'arn:aws:iam::aws:policy/AmazonS3ReadOnlyAccess';

// ============================================================================
// Credential Types
// ============================================================================

/**
 * Static access keys, as read from the `AWS` section.
 */
export interface StaticCredentials {
  type: 'static';
  /** AWS access key ID */
  accessKeyId: string;
  /** AWS secret access key */
  secretAccessKey: string;
  /** Optional session token for temporary credentials */
  sessionToken?: string;
}

/**
 * Named profile from the shared credentials file.
 */
export interface ProfileCredentials {
  type: 'profile';
  profileName: string;
}

/**
 * SDK default provider chain.
 */
export interface DefaultCredentials {
  type: 'default';
}

export type AwsCredentialSource = StaticCredentials | ProfileCredentials | DefaultCredentials;

/**
 * AWS account access.
 */
export interface AwsConfig {
  region: string;
  credentials: AwsCredentialSource;
}

// ============================================================================
// Cluster Configuration
// ============================================================================

export type ClusterType = 'single-node' | 'multi-node';

/**
 * Where the cluster master password comes from.
 */
export type MasterPasswordSource =
  | { type: 'literal'; password: string }
  | { type: 'secret'; secretId: string };

/**
 * Redshift cluster settings.
 */
export interface ClusterConfig {
  /** Cluster identifier (lowercase, starts with a letter) */
  identifier: string;
  clusterType: ClusterType;
  /** Node type, e.g. dc2.large */
  nodeType: string;
  /** Number of compute nodes; only sent for multi-node clusters */
  numberOfNodes?: number;
  /** Initial database name */
  dbName: string;
  port: number;
  masterUsername: string;
  masterPassword: MasterPasswordSource;
  /** Name of the IAM role the cluster assumes to read S3 */
  iamRoleName: string;
}

// ============================================================================
// S3 / SQL Configuration
// ============================================================================

/**
 * Object-storage locations read by the COPY statements.
 */
export interface S3Config {
  /** Event log files */
  logData?: string;
  /** JSONPaths file for the event logs */
  logJsonPath?: string;
  /** Song metadata files */
  songData?: string;
  /** Bucket region, when it differs from the cluster's */
  region?: string;
}

// ============================================================================
// Polling Configuration
// ============================================================================

/**
 * Status polling budget.
 */
export interface PollingConfig {
  /** Delay between status checks in milliseconds */
  intervalMs: number;
  /** Maximum number of status checks */
  maxAttempts: number;
  /** Delay after a create call before the first status check */
  initialDelayMs: number;
}

export interface ObservabilityConfig {
  logLevel: LogLevel;
}

// ============================================================================
// Complete Configuration
// ============================================================================

export interface DwhConfig {
  aws: AwsConfig;
  cluster: ClusterConfig;
  s3: S3Config;
  /** ARN of the role used by COPY statements */
  iamRoleArn?: string;
  polling: PollingConfig;
  observability: ObservabilityConfig;
}

// ============================================================================
// Configuration Builder
// ============================================================================

/**
 * Fluent builder for DwhConfig.
 *
 * @example
 * ```typescript
 * const config = new DwhConfigBuilder()
 *   .region('us-west-2')
 *   .profile('analytics')
 *   .cluster({
 *     identifier: 'dwh-cluster',
 *     clusterType: 'multi-node',
 *     nodeType: 'dc2.large',
 *     numberOfNodes: 4,
 *     dbName: 'dwh',
 *     masterUsername: 'dwhuser',
 *     iamRoleName: 'dwhRole',
 *   })
 *   .masterPassword('Passw0rd')
 *   .build();
 * ```
 */
export class DwhConfigBuilder {
  private regionValue?: string;
  private credentialsValue: AwsCredentialSource = { type: 'default' };
  private clusterValue?: Omit<ClusterConfig, 'masterPassword' | 'port'> & { port?: number };
  private passwordValue?: MasterPasswordSource;
  private s3Value: S3Config = {};
  private iamRoleArnValue?: string;
  private pollingValue: PollingConfig = {
    intervalMs: DEFAULT_POLL_INTERVAL_MS,
    maxAttempts: DEFAULT_POLL_MAX_ATTEMPTS,
    initialDelayMs: DEFAULT_INITIAL_DELAY_MS,
  };
  private logLevelValue: LogLevel = DEFAULT_LOG_LEVEL;

  /**
   * Creates a builder pre-populated from an existing configuration.
   */
  static from(config: DwhConfig): DwhConfigBuilder {
    const builder = new DwhConfigBuilder();
    builder.regionValue = config.aws.region;
    builder.credentialsValue = config.aws.credentials;
    builder.clusterValue = { ...config.cluster };
    builder.passwordValue = config.cluster.masterPassword;
    builder.s3Value = { ...config.s3 };
    builder.iamRoleArnValue = config.iamRoleArn;
    builder.pollingValue = { ...config.polling };
    builder.logLevelValue = config.observability.logLevel;
    return builder;
  }

  region(region: string): this {
    this.regionValue = region;
    return this;
  }

  staticCredentials(accessKeyId: string, secretAccessKey: string, sessionToken?: string): this {
    this.credentialsValue = { type: 'static', accessKeyId, secretAccessKey, sessionToken };
    return this;
  }

  profile(profileName: string): this {
    this.credentialsValue = { type: 'profile', profileName };
    return this;
  }

  defaultCredentials(): this {
    this.credentialsValue = { type: 'default' };
    return this;
  }

  /**
   * Sets the cluster settings. Redshift stores identifiers in lowercase, so
   * the identifier is lowercased here.
   */
  cluster(cluster: Omit<ClusterConfig, 'masterPassword' | 'port'> & { port?: number }): this {
    this.clusterValue = { ...cluster, identifier: cluster.identifier.toLowerCase() };
    return this;
  }

  masterPassword(password: string): this {
    this.passwordValue = { type: 'literal', password };
    return this;
  }

  masterPasswordSecret(secretId: string): this {
    this.passwordValue = { type: 'secret', secretId };
    return this;
  }

  s3(s3: S3Config): this {
    this.s3Value = { ...this.s3Value, ...s3 };
    return this;
  }

  iamRoleArn(arn: string): this {
    this.iamRoleArnValue = arn;
    return this;
  }

  polling(polling: Partial<PollingConfig>): this {
    this.pollingValue = { ...this.pollingValue, ...polling };
    return this;
  }

  logLevel(level: LogLevel): this {
    this.logLevelValue = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {MissingConfigurationError} If required configuration is missing
   * @throws {ConfigurationError} If configuration is invalid
   */
  build(): DwhConfig {
    if (!this.regionValue) {
      throw new MissingConfigurationError('DWH.DWH_REGION');
    }
    if (!this.clusterValue) {
      throw new MissingConfigurationError('DWH');
    }
    if (!this.passwordValue) {
      throw new MissingConfigurationError('DWH.DWH_DB_PASSWORD');
    }

    const config: DwhConfig = {
      aws: { region: this.regionValue, credentials: this.credentialsValue },
      cluster: {
        ...this.clusterValue,
        port: this.clusterValue.port ?? DEFAULT_PORT,
        masterPassword: this.passwordValue,
      },
      s3: { ...this.s3Value },
      iamRoleArn: this.iamRoleArnValue,
      polling: { ...this.pollingValue },
      observability: { logLevel: this.logLevelValue },
    };

    validateConfig(config);
    return config;
  }
}

// ============================================================================
// Validation
// ============================================================================

const CLUSTER_IDENTIFIER_PATTERN = /^[a-z](?!.*--)[a-z0-9-]{0,62}$/;

/**
 * Validates cross-field rules of a complete configuration.
 *
 * @throws {MissingConfigurationError} If required configuration is missing
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: DwhConfig): void {
  const { cluster, polling } = config;

  if (!config.aws.region) {
    throw new MissingConfigurationError('DWH.DWH_REGION');
  }

  if (!CLUSTER_IDENTIFIER_PATTERN.test(cluster.identifier) || cluster.identifier.endsWith('-')) {
    throw new ConfigurationError(
      'Cluster identifier must start with a letter, contain only letters, digits and single hyphens, and be at most 63 characters',
      { identifier: cluster.identifier }
    );
  }

  if (cluster.clusterType === 'multi-node') {
    if (cluster.numberOfNodes === undefined) {
      throw new MissingConfigurationError('DWH.DWH_NUM_NODES');
    }
    if (!Number.isInteger(cluster.numberOfNodes) || cluster.numberOfNodes < 2) {
      throw new ConfigurationError('A multi-node cluster needs at least 2 nodes', {
        numberOfNodes: cluster.numberOfNodes,
      });
    }
  }

  if (cluster.masterPassword.type === 'literal' && cluster.masterPassword.password.length === 0) {
    throw new MissingConfigurationError('DWH.DWH_DB_PASSWORD');
  }

  if (!Number.isInteger(cluster.port) || cluster.port < 1150 || cluster.port > 65535) {
    throw new ConfigurationError('Port must be an integer between 1150 and 65535', { port: cluster.port });
  }

  if (!Number.isInteger(polling.maxAttempts) || polling.maxAttempts < 1) {
    throw new ConfigurationError('Polling needs at least one attempt', { maxAttempts: polling.maxAttempts });
  }

  if (polling.intervalMs < 0 || polling.initialDelayMs < 0) {
    throw new ConfigurationError('Polling delays cannot be negative', {
      intervalMs: polling.intervalMs,
      initialDelayMs: polling.initialDelayMs,
    });
  }
}
