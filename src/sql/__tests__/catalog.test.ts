import { describe, it, expect } from 'vitest';

import { DwhConfigBuilder } from '../../config/index.js';
import { ConfigurationError, MissingConfigurationError } from '../../errors/index.js';
import {
  ARTIST_TABLE_CREATE,
  SONGPLAY_TABLE_CREATE,
  SONGPLAY_TABLE_INSERT,
  STAGING_EVENTS_TABLE_DROP,
  TIME_TABLE_INSERT,
  USER_TABLE_INSERT,
  createSqlCatalog,
  renderCopyStatement,
  sqlCatalogConfigFrom,
  validateS3Path,
  type SqlCatalogConfig,
} from '../index.js';

const ROLE_ARN = 'arn:aws:iam::123456789012:role/dwhRole';

const catalogConfig: SqlCatalogConfig = {
  logData: 's3://test-bucket/log_data',
  logJsonPath: 's3://test-bucket/log_json_path.json',
  songData: 's3://test-bucket/song_data',
  iamRoleArn: ROLE_ARN,
};

function tableOf(statement: string): string | undefined {
  return /^(?:DROP TABLE IF EXISTS|CREATE TABLE IF NOT EXISTS|INSERT INTO|COPY) (\w+)/.exec(statement)?.[1];
}

describe('createSqlCatalog', () => {
  const catalog = createSqlCatalog(catalogConfig);

  it('drops every table, staging first', () => {
    expect(catalog.drop.map(tableOf)).toEqual([
      'staging_events',
      'staging_songs',
      'songplays',
      'users',
      'songs',
      'artists',
      'time',
    ]);
    expect(catalog.drop[0]).toBe(STAGING_EVENTS_TABLE_DROP);
    expect(catalog.drop[0]).toBe('DROP TABLE IF EXISTS staging_events');
  });

  it('creates referenced tables before songplays', () => {
    expect(catalog.create.map(tableOf)).toEqual([
      'staging_events',
      'staging_songs',
      'users',
      'artists',
      'songs',
      'time',
      'songplays',
    ]);
    expect(catalog.create.at(-1)).toBe(SONGPLAY_TABLE_CREATE);
  });

  it('loads dimensions before the fact table', () => {
    expect(catalog.insert.map(tableOf)).toEqual(['users', 'artists', 'songs', 'time', 'songplays']);
  });

  it('copies both staging tables with the configured values', () => {
    expect(catalog.copy).toEqual([
      [
        'COPY staging_events',
        "FROM 's3://test-bucket/log_data'",
        `IAM_ROLE '${ROLE_ARN}'`,
        "FORMAT AS JSON 's3://test-bucket/log_json_path.json'",
      ].join('\n'),
      ['COPY staging_songs', "FROM 's3://test-bucket/song_data'", `IAM_ROLE '${ROLE_ARN}'`, "FORMAT AS JSON 'auto'"].join(
        '\n'
      ),
    ]);
  });

  it('adds the region clause when configured', () => {
    const withRegion = createSqlCatalog({ ...catalogConfig, region: 'us-west-2' });

    expect(withRegion.copy[1]).toBe(
      ['COPY staging_songs', "FROM 's3://test-bucket/song_data'", `IAM_ROLE '${ROLE_ARN}'`, "REGION 'us-west-2'", "FORMAT AS JSON 'auto'"].join(
        '\n'
      )
    );
  });

  it('leaves every other statement independent of the configuration', () => {
    const other = createSqlCatalog({
      logData: 's3://other/events',
      logJsonPath: 's3://other/paths.json',
      songData: 's3://other/songs',
      iamRoleArn: 'arn:aws:iam::210987654321:role/other',
      region: 'eu-central-1',
    });

    expect(other.drop).toEqual(catalog.drop);
    expect(other.create).toEqual(catalog.create);
    expect(other.insert).toEqual(catalog.insert);
    expect(other.copy).not.toEqual(catalog.copy);
  });

  it('returns frozen lists', () => {
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.copy)).toBe(true);
    expect(Object.isFrozen(catalog.drop)).toBe(true);
    expect(Object.isFrozen(catalog.create)).toBe(true);
    expect(Object.isFrozen(catalog.insert)).toBe(true);
  });

  it('rejects data paths outside S3', () => {
    expect(() => createSqlCatalog({ ...catalogConfig, songData: '/data/songs' })).toThrow(
      new ConfigurationError('S3.SONG_DATA must be an s3:// path')
    );
  });
});

describe('table statements', () => {
  it('declares the songplays foreign keys', () => {
    expect(SONGPLAY_TABLE_CREATE).toContain('songplay_id bigint IDENTITY(0,1) PRIMARY KEY');
    expect(SONGPLAY_TABLE_CREATE).toContain('start_time timestamp NOT NULL REFERENCES time(start_time)');
    expect(SONGPLAY_TABLE_CREATE).toContain('artist_id varchar NOT NULL REFERENCES artists(artist_id)');
    expect(ARTIST_TABLE_CREATE).toContain('artist_id varchar PRIMARY KEY');
  });

  it('loads song plays from NextSong events only', () => {
    expect(SONGPLAY_TABLE_INSERT).toContain("DATEADD(ms, ts, '1970-01-01 00:00:00') AS start_time");
    expect(SONGPLAY_TABLE_INSERT.endsWith("WHERE events.page = 'NextSong'")).toBe(true);
  });

  it('keeps the latest level per user', () => {
    expect(USER_TABLE_INSERT).toContain('last_value(level) OVER (');
    expect(USER_TABLE_INSERT.endsWith('WHERE userId IS NOT NULL')).toBe(true);
  });

  it('extracts every time unit', () => {
    for (const unit of ['hour', 'day', 'week', 'month', 'year', 'weekday']) {
      expect(TIME_TABLE_INSERT).toContain(`EXTRACT(${unit} FROM start_time) AS ${unit}`);
    }
  });
});

describe('renderCopyStatement', () => {
  it('writes one clause per line', () => {
    expect(
      renderCopyStatement('staging_songs', 's3://bucket/songs', { iamRoleArn: ROLE_ARN, jsonPaths: 'auto' }).split('\n')
    ).toEqual(['COPY staging_songs', "FROM 's3://bucket/songs'", `IAM_ROLE '${ROLE_ARN}'`, "FORMAT AS JSON 'auto'"]);
  });
});

describe('validateS3Path', () => {
  it('accepts s3 URIs', () => {
    expect(() => validateS3Path('s3://bucket/prefix')).not.toThrow();
  });

  it.each(['', 's3://', 'https://bucket.s3.amazonaws.com/key', 'bucket/key'])('rejects %j', (path) => {
    expect(() => validateS3Path(path, 'S3.LOG_DATA')).toThrow(ConfigurationError);
  });
});

describe('sqlCatalogConfigFrom', () => {
  const builder = () =>
    new DwhConfigBuilder()
      .region('us-west-2')
      .cluster({
        identifier: 'dwh-cluster',
        clusterType: 'single-node',
        nodeType: 'dc2.large',
        dbName: 'dwh',
        masterUsername: 'dwhuser',
        iamRoleName: 'dwhRole',
      })
      .masterPassword('test-password');

  it('reads the S3 section and role ARN', () => {
    const config = builder()
      .s3({
        logData: catalogConfig.logData,
        logJsonPath: catalogConfig.logJsonPath,
        songData: catalogConfig.songData,
        region: 'us-west-2',
      })
      .iamRoleArn(ROLE_ARN)
      .build();

    expect(sqlCatalogConfigFrom(config)).toEqual({ ...catalogConfig, region: 'us-west-2' });
  });

  it('names the first missing key', () => {
    const config = builder().s3({ logData: catalogConfig.logData }).iamRoleArn(ROLE_ARN).build();

    expect(() => sqlCatalogConfigFrom(config)).toThrow(new MissingConfigurationError('S3.LOG_JSONPATH'));
  });

  it('requires the role ARN', () => {
    const config = builder()
      .s3({ logData: catalogConfig.logData, logJsonPath: catalogConfig.logJsonPath, songData: catalogConfig.songData })
      .build();

    expect(() => sqlCatalogConfigFrom(config)).toThrow('Missing required configuration: IAM_ROLE.ARN');
  });
});
