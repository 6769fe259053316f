/**
 * SQL Catalog
 *
 * The four ordered statement lists an ETL runner executes: drop, create,
 * copy and insert.
 *
 * @module sql/catalog
 */

import type { DwhConfig } from '../config/index.js';
import { MissingConfigurationError } from '../errors/index.js';
import { renderCopyStatement, validateS3Path } from './copy.js';
import { INSERT_TABLE_QUERIES } from './insert.js';
import { CREATE_TABLE_QUERIES, DROP_TABLE_QUERIES } from './tables.js';

/**
 * Values the COPY statements are built from.
 */
export interface SqlCatalogConfig {
  /** `S3.LOG_DATA` */
  logData: string;
  /** `S3.LOG_JSONPATH` */
  logJsonPath: string;
  /** `S3.SONG_DATA` */
  songData: string;
  /** `IAM_ROLE.ARN` */
  iamRoleArn: string;
  /** `S3.REGION` */
  region?: string;
}

export interface SqlCatalog {
  readonly drop: readonly string[];
  readonly create: readonly string[];
  readonly copy: readonly string[];
  readonly insert: readonly string[];
}

/**
 * Builds the catalog. Only the copy list depends on `config`.
 *
 * @throws {ConfigurationError} If a data path is not an s3:// path
 */
export function createSqlCatalog(config: SqlCatalogConfig): SqlCatalog {
  validateS3Path(config.logData, 'S3.LOG_DATA');
  validateS3Path(config.logJsonPath, 'S3.LOG_JSONPATH');
  validateS3Path(config.songData, 'S3.SONG_DATA');

  const copy = Object.freeze([
    renderCopyStatement('staging_events', config.logData, {
      iamRoleArn: config.iamRoleArn,
      region: config.region,
      jsonPaths: config.logJsonPath,
    }),
    renderCopyStatement('staging_songs', config.songData, {
      iamRoleArn: config.iamRoleArn,
      region: config.region,
      jsonPaths: 'auto',
    }),
  ]);

  return Object.freeze({
    drop: DROP_TABLE_QUERIES,
    create: CREATE_TABLE_QUERIES,
    copy,
    insert: INSERT_TABLE_QUERIES,
  });
}

/**
 * Extracts catalog settings from a loaded configuration.
 *
 * @throws {MissingConfigurationError} If an S3 path or the role ARN is not configured
 */
export function sqlCatalogConfigFrom(config: DwhConfig): SqlCatalogConfig {
  const { logData, logJsonPath, songData, region } = config.s3;
  if (!logData) {
    throw new MissingConfigurationError('S3.LOG_DATA');
  }
  if (!logJsonPath) {
    throw new MissingConfigurationError('S3.LOG_JSONPATH');
  }
  if (!songData) {
    throw new MissingConfigurationError('S3.SONG_DATA');
  }
  if (!config.iamRoleArn) {
    throw new MissingConfigurationError('IAM_ROLE.ARN');
  }
  return { logData, logJsonPath, songData, iamRoleArn: config.iamRoleArn, region };
}
