/**
 * reelbase SQLite schema
 * movies / genres / movie_genres are replaced wholesale on every run;
 * pipeline_runs keeps the history.
 */

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

export function applySchema(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    );

    -- One row per resolved film
    CREATE TABLE IF NOT EXISTS movies (
      movie_id            INTEGER PRIMARY KEY,
      imdb_id             TEXT,
      title               TEXT NOT NULL,
      normalized_title    TEXT NOT NULL,
      year                INTEGER NOT NULL,
      decade              INTEGER NOT NULL,
      release_date        TEXT,                 -- YYYY-MM-DD
      certificate         TEXT,
      rating              REAL,                 -- 0-10
      votes               INTEGER,
      popularity          REAL,
      runtime             REAL,                 -- minutes
      description         TEXT,
      director            TEXT,
      language            TEXT,
      production_countries TEXT,

      -- Financial figures (nullable: coverage depends on the financial catalog)
      production_budget   REAL,
      domestic_gross      REAL,
      worldwide_gross     REAL,

      -- Provenance flags (0/1)
      from_metadata       INTEGER NOT NULL DEFAULT 0,
      from_genres         INTEGER NOT NULL DEFAULT 0,
      from_financial      INTEGER NOT NULL DEFAULT 0,

      UNIQUE (normalized_title, year)
    );

    CREATE INDEX IF NOT EXISTS idx_movies_imdb_id ON movies(imdb_id);
    CREATE INDEX IF NOT EXISTS idx_movies_decade  ON movies(decade);

    CREATE TABLE IF NOT EXISTS genres (
      genre_id  INTEGER PRIMARY KEY,
      name      TEXT UNIQUE NOT NULL
    );

    CREATE TABLE IF NOT EXISTS movie_genres (
      movie_id  INTEGER NOT NULL REFERENCES movies(movie_id) ON DELETE CASCADE,
      genre_id  INTEGER NOT NULL REFERENCES genres(genre_id) ON DELETE CASCADE,
      PRIMARY KEY (movie_id, genre_id)
    );

    CREATE INDEX IF NOT EXISTS idx_movie_genres_genre ON movie_genres(genre_id);

    -- One row per pipeline run
    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id            INTEGER PRIMARY KEY,
      started_at    TEXT NOT NULL,
      finished_at   TEXT NOT NULL DEFAULT (datetime('now')),
      as_of         TEXT NOT NULL,
      dry_run       INTEGER NOT NULL DEFAULT 0,
      movies        INTEGER NOT NULL,
      genres        INTEGER NOT NULL,
      movie_genres  INTEGER NOT NULL,
      report        TEXT NOT NULL            -- JSON PipelineReport
    );
  `);

  const row = db.prepare('SELECT version FROM schema_version').get() as { version: number } | undefined;
  if (!row) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  } else if (row.version < SCHEMA_VERSION) {
    db.prepare('UPDATE schema_version SET version = ?').run(SCHEMA_VERSION);
  }
}
