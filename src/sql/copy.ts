/**
 * COPY statements for the staging tables.
 *
 * @module sql/copy
 */

import { ConfigurationError } from '../errors/index.js';

/**
 * Options for {@link renderCopyStatement}.
 */
export interface CopyStatementOptions {
  /** Role the cluster assumes to read the source */
  iamRoleArn: string;
  /** Bucket region, when it differs from the cluster's */
  region?: string;
  /** JSONPaths file; `'auto'` maps JSON keys to column names */
  jsonPaths: string;
}

/**
 * Checks that `path` is an S3 URI.
 *
 * @param key - Configuration key reported on failure
 * @throws {ConfigurationError} If `path` does not start with `s3://`
 */
export function validateS3Path(path: string, key = 'S3'): void {
  if (!path.startsWith('s3://') || path.length <= 's3://'.length) {
    throw new ConfigurationError(`${key} must be an s3:// path`, { key, path });
  }
}

/**
 * Builds a JSON COPY command, one clause per line.
 *
 * Values are inserted exactly as given.
 *
 * @example
 * ```typescript
 * renderCopyStatement('staging_songs', 's3://bucket/song_data', {
 *   iamRoleArn: 'arn:aws:iam::123456789012:role/dwhRole',
 *   jsonPaths: 'auto',
 * });
 * // COPY staging_songs
 * // FROM 's3://bucket/song_data'
 * // IAM_ROLE 'arn:aws:iam::123456789012:role/dwhRole'
 * // FORMAT AS JSON 'auto'
 * ```
 */
export function renderCopyStatement(table: string, source: string, options: CopyStatementOptions): string {
  const parts: string[] = [];

  parts.push(`COPY ${table}`);
  parts.push(`FROM '${source}'`);
  parts.push(`IAM_ROLE '${options.iamRoleArn}'`);

  if (options.region) {
    parts.push(`REGION '${options.region}'`);
  }

  parts.push(`FORMAT AS JSON '${options.jsonPaths}'`);

  return parts.join('\n');
}
