/**
 * Star schema load statements.
 *
 * Each statement selects from the staging tables; none depends on
 * configuration.
 *
 * @module sql/insert
 */

/**
 * Event-log timestamps are epoch milliseconds.
 */
const EVENT_START_TIME = "DATEADD(ms, ts, '1970-01-01 00:00:00')";

/**
 * Song plays are `NextSong` events matched to a song by title, duration
 * and artist name.
 */
export const SONGPLAY_TABLE_INSERT = `INSERT INTO songplays (
    start_time, user_id, level, song_id,
    artist_id, session_id, location, user_agent
)
SELECT
    ${EVENT_START_TIME} AS start_time,
    events.userId AS user_id,
    events.level,
    songs.song_id,
    songs.artist_id,
    events.sessionId AS session_id,
    events.location,
    events.userAgent AS user_agent
FROM staging_events events
JOIN staging_songs songs
    ON (events.song = songs.title
    AND events.length = songs.duration
    AND events.artist = songs.artist_name)
WHERE events.page = 'NextSong'`;

/**
 * A user's level is taken from their latest event.
 */
export const USER_TABLE_INSERT = `INSERT INTO users (user_id, first_name, last_name, gender, level)
SELECT DISTINCT
    userId AS user_id,
    firstName AS first_name,
    lastName AS last_name,
    gender,
    last_value(level) OVER (
        PARTITION BY userId
        ROWS BETWEEN UNBOUNDED PRECEDING AND UNBOUNDED FOLLOWING)
FROM staging_events
WHERE userId IS NOT NULL`;

export const SONG_TABLE_INSERT = `INSERT INTO songs (song_id, title, artist_id, year, duration)
SELECT DISTINCT
    song_id,
    title,
    artist_id,
    year,
    duration
FROM staging_songs`;

export const ARTIST_TABLE_INSERT = `INSERT INTO artists (artist_id, name, location, latitude, longitude)
SELECT DISTINCT
    artist_id,
    artist_name,
    artist_location,
    artist_latitude,
    artist_longitude
FROM staging_songs`;

export const TIME_TABLE_INSERT = `INSERT INTO time (start_time, hour, day, week, month, year, weekday)
SELECT DISTINCT
    ${EVENT_START_TIME} AS start_time,
    EXTRACT(hour FROM start_time) AS hour,
    EXTRACT(day FROM start_time) AS day,
    EXTRACT(week FROM start_time) AS week,
    EXTRACT(month FROM start_time) AS month,
    EXTRACT(year FROM start_time) AS year,
    EXTRACT(weekday FROM start_time) AS weekday
FROM staging_events`;

/**
 * Dimensions are loaded before the fact table.
 */
export const INSERT_TABLE_QUERIES: readonly string[] = Object.freeze([
  USER_TABLE_INSERT,
  ARTIST_TABLE_INSERT,
  SONG_TABLE_INSERT,
  TIME_TABLE_INSERT,
  SONGPLAY_TABLE_INSERT,
]);
