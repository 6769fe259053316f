/**
 * Table DDL for the song-play schema.
 *
 * Two staging tables receive the raw S3 data; the star schema is one fact
 * table (`songplays`) and four dimension tables.
 *
 * @module sql/tables
 */

// ============================================================================
// Drop Statements
// ============================================================================

export const STAGING_EVENTS_TABLE_DROP = 'DROP TABLE IF EXISTS staging_events';
export const STAGING_SONGS_TABLE_DROP = 'DROP TABLE IF EXISTS staging_songs';
export const SONGPLAY_TABLE_DROP = 'DROP TABLE IF EXISTS songplays';
export const USER_TABLE_DROP = 'DROP TABLE IF EXISTS users';
export const SONG_TABLE_DROP = 'DROP TABLE IF EXISTS songs';
export const ARTIST_TABLE_DROP = 'DROP TABLE IF EXISTS artists';
export const TIME_TABLE_DROP = 'DROP TABLE IF EXISTS time';

// ============================================================================
// Staging Tables
// ============================================================================

/**
 * One row per event-log record; column names follow the log JSON keys.
 */
export const STAGING_EVENTS_TABLE_CREATE = `CREATE TABLE IF NOT EXISTS staging_events (
    artist varchar,
    auth varchar,
    firstName varchar,
    gender varchar,
    itemInSession int,
    lastName varchar,
    length float,
    level varchar,
    location varchar,
    method varchar,
    page varchar,
    registration float,
    sessionId int,
    song varchar,
    status int,
    ts bigint,
    userAgent varchar,
    userId int
)`;

export const STAGING_SONGS_TABLE_CREATE = `CREATE TABLE IF NOT EXISTS staging_songs (
    num_songs int,
    artist_id varchar,
    artist_latitude float,
    artist_longitude float,
    artist_location varchar,
    artist_name varchar,
    song_id varchar,
    title varchar,
    duration float,
    year int
)`;

// ============================================================================
// Star Schema
// ============================================================================

export const SONGPLAY_TABLE_CREATE = `CREATE TABLE IF NOT EXISTS songplays (
    songplay_id bigint IDENTITY(0,1) PRIMARY KEY,
    start_time timestamp NOT NULL REFERENCES time(start_time),
    user_id int NOT NULL REFERENCES users(user_id),
    level varchar NOT NULL,
    song_id varchar NOT NULL REFERENCES songs(song_id),
    artist_id varchar NOT NULL REFERENCES artists(artist_id),
    session_id int,
    location varchar,
    user_agent varchar
)`;

export const USER_TABLE_CREATE = `CREATE TABLE IF NOT EXISTS users (
    user_id int PRIMARY KEY,
    first_name varchar,
    last_name varchar NOT NULL,
    gender varchar(1) NOT NULL,
    level varchar NOT NULL
)`;

export const SONG_TABLE_CREATE = `CREATE TABLE IF NOT EXISTS songs (
    song_id varchar PRIMARY KEY,
    title varchar NOT NULL,
    artist_id varchar NOT NULL REFERENCES artists(artist_id),
    year int,
    duration numeric
)`;

export const ARTIST_TABLE_CREATE = `CREATE TABLE IF NOT EXISTS artists (
    artist_id varchar PRIMARY KEY,
    name varchar NOT NULL,
    location varchar,
    latitude float,
    longitude float
)`;

export const TIME_TABLE_CREATE = `CREATE TABLE IF NOT EXISTS time (
    start_time timestamp PRIMARY KEY,
    hour int,
    day int,
    week int,
    month int,
    year int,
    weekday int
)`;

// ============================================================================
// Ordered Lists
// ============================================================================

/**
 * Referenced tables come before `songplays`.
 */
export const CREATE_TABLE_QUERIES: readonly string[] = Object.freeze([
  STAGING_EVENTS_TABLE_CREATE,
  STAGING_SONGS_TABLE_CREATE,
  USER_TABLE_CREATE,
  ARTIST_TABLE_CREATE,
  SONG_TABLE_CREATE,
  TIME_TABLE_CREATE,
  SONGPLAY_TABLE_CREATE,
]);

export const DROP_TABLE_QUERIES: readonly string[] = Object.freeze([
  STAGING_EVENTS_TABLE_DROP,
  STAGING_SONGS_TABLE_DROP,
  SONGPLAY_TABLE_DROP,
  USER_TABLE_DROP,
  SONG_TABLE_DROP,
  ARTIST_TABLE_DROP,
  TIME_TABLE_DROP,
]);
