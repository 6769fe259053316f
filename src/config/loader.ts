/**
 * Configuration file and environment loading.
 *
 * The configuration file is INI with the sections `AWS`, `DWH`, `S3` and
 * `IAM_ROLE`. Environment variables listed in {@link ENVIRONMENT_OVERRIDES}
 * take precedence over file values.
 * @module dwh-provisioner/config/loader
 */

import { readFile } from 'node:fs/promises';
import ini from 'ini';
import { z } from 'zod';

import { ConfigurationError, MissingConfigurationError } from '../errors/index.js';
import { parseLogLevel } from '../logging/index.js';
import { DEFAULT_CONFIG_PATH, DEFAULT_LOG_LEVEL, DwhConfigBuilder, type DwhConfig } from './config.js';

// ============================================================================
// Raw File Schema
// ============================================================================

const requiredString = z.string().trim().min(1);
const optionalString = z.string().trim().min(1).optional();
const optionalInteger = z.coerce.number().int().nonnegative().optional();

const rawConfigSchema = z.object({
  AWS: z
    .object({
      KEY: optionalString,
      SECRET: optionalString,
      SESSION_TOKEN: optionalString,
      PROFILE: optionalString,
    })
    .default({}),
  DWH: z.object({
    DWH_REGION: requiredString,
    DWH_CLUSTER_TYPE: z.enum(['single-node', 'multi-node']),
    DWH_NUM_NODES: optionalInteger,
    DWH_NODE_TYPE: requiredString,
    DWH_CLUSTER_IDENTIFIER: requiredString,
    DWH_DB: requiredString,
    DWH_DB_USER: requiredString,
    DWH_DB_PASSWORD: optionalString,
    DWH_DB_PASSWORD_SECRET_ID: optionalString,
    DWH_PORT: optionalInteger,
    DWH_IAM_ROLE_NAME: requiredString,
    DWH_POLL_INTERVAL_MS: optionalInteger,
    DWH_POLL_MAX_ATTEMPTS: optionalInteger,
    DWH_POLL_INITIAL_DELAY_MS: optionalInteger,
    DWH_LOG_LEVEL: optionalString,
  }),
  S3: z
    .object({
      LOG_DATA: optionalString,
      LOG_JSONPATH: optionalString,
      SONG_DATA: optionalString,
      REGION: optionalString,
    })
    .default({}),
  IAM_ROLE: z
    .object({
      ARN: optionalString,
    })
    .default({}),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

type RawSections = Record<string, Record<string, string>>;

// ============================================================================
// Environment Overrides
// ============================================================================

/**
 * Environment variables that override configuration file values, as
 * `[section, key]` pairs.
 */
export const ENVIRONMENT_OVERRIDES: Readonly<Record<string, readonly [string, string]>> = {
  AWS_ACCESS_KEY_ID: ['AWS', 'KEY'],
  AWS_SECRET_ACCESS_KEY: ['AWS', 'SECRET'],
  AWS_SESSION_TOKEN: ['AWS', 'SESSION_TOKEN'],
  AWS_PROFILE: ['AWS', 'PROFILE'],
  DWH_REGION: ['DWH', 'DWH_REGION'],
  DWH_CLUSTER_TYPE: ['DWH', 'DWH_CLUSTER_TYPE'],
  DWH_NUM_NODES: ['DWH', 'DWH_NUM_NODES'],
  DWH_NODE_TYPE: ['DWH', 'DWH_NODE_TYPE'],
  DWH_CLUSTER_IDENTIFIER: ['DWH', 'DWH_CLUSTER_IDENTIFIER'],
  DWH_DB: ['DWH', 'DWH_DB'],
  DWH_DB_USER: ['DWH', 'DWH_DB_USER'],
  DWH_DB_PASSWORD: ['DWH', 'DWH_DB_PASSWORD'],
  DWH_DB_PASSWORD_SECRET_ID: ['DWH', 'DWH_DB_PASSWORD_SECRET_ID'],
  DWH_PORT: ['DWH', 'DWH_PORT'],
  DWH_IAM_ROLE_NAME: ['DWH', 'DWH_IAM_ROLE_NAME'],
  DWH_POLL_INTERVAL_MS: ['DWH', 'DWH_POLL_INTERVAL_MS'],
  DWH_POLL_MAX_ATTEMPTS: ['DWH', 'DWH_POLL_MAX_ATTEMPTS'],
  DWH_POLL_INITIAL_DELAY_MS: ['DWH', 'DWH_POLL_INITIAL_DELAY_MS'],
  DWH_LOG_LEVEL: ['DWH', 'DWH_LOG_LEVEL'],
  DWH_S3_LOG_DATA: ['S3', 'LOG_DATA'],
  DWH_S3_LOG_JSONPATH: ['S3', 'LOG_JSONPATH'],
  DWH_S3_SONG_DATA: ['S3', 'SONG_DATA'],
  DWH_S3_REGION: ['S3', 'REGION'],
  DWH_IAM_ROLE_ARN: ['IAM_ROLE', 'ARN'],
};

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Path of the INI file (default: dwh.cfg in the working directory) */
  path?: string;
  /** Environment used for overrides (default: process.env) */
  env?: Environment;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Reads, merges and validates the configuration.
 *
 * @throws {ConfigurationError} If the file cannot be read or is invalid
 * @throws {MissingConfigurationError} If a required key is absent
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DwhConfig> {
  const path = options.path ?? DEFAULT_CONFIG_PATH;
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read configuration file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }
  return parseConfig(text, options.env ?? process.env);
}

/**
 * Parses INI text and applies environment overrides.
 */
export function parseConfig(text: string, env: Environment = {}): DwhConfig {
  rejectInlineComments(text);
  const sections = normalizeSections(ini.parse(text));
  applyEnvironment(sections, env);
  return toConfig(validateRaw(sections));
}

/**
 * The INI parser ends an unquoted value at the first unescaped `;` or `#`,
 * so values containing either must be quoted or escaped.
 *
 * @throws {ConfigurationError} Naming the first affected key
 */
function rejectInlineComments(text: string): void {
  let section = '';
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith(';') || line.startsWith('#')) {
      continue;
    }
    const header = /^\[([^\]]*)\]$/.exec(line);
    if (header) {
      section = (header[1] ?? '').trim().toUpperCase();
      continue;
    }
    const separator = line.indexOf('=');
    if (separator < 0) {
      continue;
    }
    const value = line.slice(separator + 1).trim();
    if (!isQuoted(value) && hasUnescapedCommentMarker(value)) {
      const key = line.slice(0, separator).trim().toUpperCase();
      const name = section ? `${section}.${key}` : key;
      throw new ConfigurationError(
        `Value of ${name} contains an unquoted ';' or '#'; wrap the value in double quotes`,
        { key: name }
      );
    }
  }
}

function isQuoted(value: string): boolean {
  return (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
  );
}

function hasUnescapedCommentMarker(value: string): boolean {
  let escaped = false;
  for (const char of value) {
    if (escaped) {
      escaped = false;
    } else if (char === '\\') {
      escaped = true;
    } else if (char === ';' || char === '#') {
      return true;
    }
  }
  return false;
}

/**
 * Upper-cases section and key names and drops empty or non-string values.
 */
function normalizeSections(parsed: Record<string, unknown>): RawSections {
  const sections: RawSections = {};
  for (const [sectionName, section] of Object.entries(parsed)) {
    if (typeof section !== 'object' || section === null) {
      continue;
    }
    const values: Record<string, string> = {};
    for (const [key, value] of Object.entries(section)) {
      if (typeof value === 'string' && value.trim().length > 0) {
        values[key.toUpperCase()] = value;
      }
    }
    sections[sectionName.toUpperCase()] = values;
  }
  return sections;
}

function applyEnvironment(sections: RawSections, env: Environment): void {
  for (const [variable, [section, key]] of Object.entries(ENVIRONMENT_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value.trim().length === 0) {
      continue;
    }
    sections[section] = { ...sections[section], [key]: value };
  }
}

function validateRaw(sections: RawSections): RawConfig {
  const result = rawConfigSchema.safeParse(sections);
  if (result.success) {
    return result.data;
  }

  const missing = result.error.issues.find(
    (issue) => issue.code === 'invalid_type' && issue.received === 'undefined'
  );
  if (missing) {
    throw new MissingConfigurationError(missing.path.join('.'));
  }

  throw new ConfigurationError(
    `Invalid configuration: ${result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')}`,
    { issues: result.error.issues.map((issue) => issue.path.join('.')) }
  );
}

function toConfig(raw: RawConfig): DwhConfig {
  const { AWS: aws, DWH: dwh, S3: s3, IAM_ROLE: role } = raw;
  const builder = new DwhConfigBuilder().region(dwh.DWH_REGION);

  if (aws.KEY && aws.SECRET) {
    builder.staticCredentials(aws.KEY, aws.SECRET, aws.SESSION_TOKEN);
  } else if (aws.KEY || aws.SECRET) {
    throw new MissingConfigurationError(aws.KEY ? 'AWS.SECRET' : 'AWS.KEY');
  } else if (aws.PROFILE) {
    builder.profile(aws.PROFILE);
  }

  builder.cluster({
    identifier: dwh.DWH_CLUSTER_IDENTIFIER,
    clusterType: dwh.DWH_CLUSTER_TYPE,
    nodeType: dwh.DWH_NODE_TYPE,
    numberOfNodes: dwh.DWH_NUM_NODES,
    dbName: dwh.DWH_DB,
    port: dwh.DWH_PORT,
    masterUsername: dwh.DWH_DB_USER,
    iamRoleName: dwh.DWH_IAM_ROLE_NAME,
  });

  if (dwh.DWH_DB_PASSWORD && dwh.DWH_DB_PASSWORD_SECRET_ID) {
    throw new ConfigurationError('Set either DWH.DWH_DB_PASSWORD or DWH.DWH_DB_PASSWORD_SECRET_ID, not both');
  }
  if (dwh.DWH_DB_PASSWORD_SECRET_ID) {
    builder.masterPasswordSecret(dwh.DWH_DB_PASSWORD_SECRET_ID);
  } else if (dwh.DWH_DB_PASSWORD) {
    builder.masterPassword(dwh.DWH_DB_PASSWORD);
  } else {
    throw new MissingConfigurationError('DWH.DWH_DB_PASSWORD');
  }

  builder.s3({
    logData: s3.LOG_DATA,
    logJsonPath: s3.LOG_JSONPATH,
    songData: s3.SONG_DATA,
    region: s3.REGION,
  });
  if (role.ARN) {
    builder.iamRoleArn(role.ARN);
  }

  const { DWH_POLL_INTERVAL_MS: intervalMs, DWH_POLL_MAX_ATTEMPTS: maxAttempts } = dwh;
  const initialDelayMs = dwh.DWH_POLL_INITIAL_DELAY_MS;
  builder.polling({
    ...(intervalMs !== undefined ? { intervalMs } : {}),
    ...(maxAttempts !== undefined ? { maxAttempts } : {}),
    ...(initialDelayMs !== undefined ? { initialDelayMs } : {}),
  });
  builder.logLevel(parseLogLevel(dwh.DWH_LOG_LEVEL, DEFAULT_LOG_LEVEL));

  return builder.build();
}
