/**
 * Warehouse Provisioning Configuration
 *
 * Configuration interfaces, builder and file loading.
 * @module dwh-provisioner/config
 */

export type {
  DwhConfig,
  AwsConfig,
  AwsCredentialSource,
  StaticCredentials,
  ProfileCredentials,
  DefaultCredentials,
  ClusterConfig,
  ClusterType,
  MasterPasswordSource,
  S3Config,
  PollingConfig,
  ObservabilityConfig,
} from './config.js';

export {
  DwhConfigBuilder,
  validateConfig,
  DEFAULT_CONFIG_PATH,
  DEFAULT_PORT,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_POLL_MAX_ATTEMPTS,
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_LOG_LEVEL,
  S3_READ_ONLY_POLICY_ARN,
} from './config.js';

export { loadConfig, parseConfig, ENVIRONMENT_OVERRIDES } from './loader.js';
export type { LoadConfigOptions, Environment } from './loader.js';
