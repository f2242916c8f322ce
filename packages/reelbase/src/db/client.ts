/**
 * reelbase DB client
 * Typed wrappers around better-sqlite3; implements the pipeline's TableSink.
 */

import path from 'node:path';
import fs from 'node:fs';
import BetterSqlite3 from 'better-sqlite3';
import type Database from 'better-sqlite3';

import type { PipelineReport } from '../pipeline/pipeline.js';
import type { OutputTables, TableSink } from '../shared/types.js';
import { applySchema } from './schema.js';

export interface MovieRow {
  movie_id: number;
  imdb_id: string | null;
  title: string;
  normalized_title: string;
  year: number;
  decade: number;
  release_date: string | null;
  certificate: string | null;
  rating: number | null;
  votes: number | null;
  popularity: number | null;
  runtime: number | null;
  description: string | null;
  director: string | null;
  language: string | null;
  production_countries: string | null;
  production_budget: number | null;
  domestic_gross: number | null;
  worldwide_gross: number | null;
  from_metadata: number;
  from_genres: number;
  from_financial: number;
}

export interface GenreRow {
  genre_id: number;
  name: string;
}

export interface MovieGenreRow {
  movie_id: number;
  genre_id: number;
}

export interface PipelineRunRow {
  id: number;
  started_at: string;
  finished_at: string;
  as_of: string;
  dry_run: number;
  movies: number;
  genres: number;
  movie_genres: number;
  report: string;
}

export interface RunSummary {
  startedAt: string;
  dryRun: boolean;
  report: PipelineReport;
}

export interface DbStats {
  totalMovies: number;
  totalGenres: number;
  totalAssociations: number;
  fromMetadata: number;
  fromGenres: number;
  fromBoth: number;
  withFinancials: number;
  decadeDist: Record<string, number>;
  certificateDist: Record<string, number>;
  topGenres: { name: string; n: number }[];
}

export class MovieDb implements TableSink {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    }
    this.db = new BetterSqlite3(dbPath);
    applySchema(this.db);
  }

  // ──────────────────────────────────────────────────────────────────
  // Table replacement
  // ──────────────────────────────────────────────────────────────────

  /**
   * Replace all three tables in one transaction. Any failure rolls back,
   * leaving the previous run's tables in place.
   */
  writeTables(tables: OutputTables): void {
    const insertMovie = this.db.prepare(`
      INSERT INTO movies (
        movie_id, imdb_id, title, normalized_title, year, decade, release_date,
        certificate, rating, votes, popularity, runtime, description, director,
        language, production_countries, production_budget, domestic_gross,
        worldwide_gross, from_metadata, from_genres, from_financial
      ) VALUES (
        @movieId, @imdbId, @title, @normalizedTitle, @year, @decade, @releaseDate,
        @certificate, @rating, @votes, @popularity, @runtime, @description, @director,
        @language, @productionCountries, @productionBudget, @domesticGross,
        @worldwideGross, @fromMetadata, @fromGenres, @fromFinancial
      )
    `);
    const insertGenre = this.db.prepare('INSERT INTO genres (genre_id, name) VALUES (?, ?)');
    const insertLink = this.db.prepare('INSERT INTO movie_genres (movie_id, genre_id) VALUES (?, ?)');

    const replace = this.db.transaction((t: OutputTables) => {
      this.db.exec('DELETE FROM movie_genres; DELETE FROM movies; DELETE FROM genres;');
      for (const m of t.movies) {
        const { provenance, ...fields } = m;
        insertMovie.run({
          ...fields,
          fromMetadata: provenance.metadata ? 1 : 0,
          fromGenres: provenance.genres ? 1 : 0,
          fromFinancial: provenance.financial ? 1 : 0,
        });
      }
      for (const g of t.genres) insertGenre.run(g.genreId, g.name);
      for (const mg of t.movieGenres) insertLink.run(mg.movieId, mg.genreId);
    });

    replace(tables);
  }

  // ──────────────────────────────────────────────────────────────────
  // Reads
  // ──────────────────────────────────────────────────────────────────

  getMovies(limit?: number): MovieRow[] {
    if (limit != null) {
      return this.db.prepare('SELECT * FROM movies ORDER BY movie_id LIMIT ?').all(limit) as MovieRow[];
    }
    return this.db.prepare('SELECT * FROM movies ORDER BY movie_id').all() as MovieRow[];
  }

  getGenres(): GenreRow[] {
    return this.db.prepare('SELECT * FROM genres ORDER BY genre_id').all() as GenreRow[];
  }

  getMovieGenres(): MovieGenreRow[] {
    return this.db.prepare(
      'SELECT * FROM movie_genres ORDER BY movie_id, genre_id'
    ).all() as MovieGenreRow[];
  }

  getStats(topGenres = 10): DbStats {
    const count = (sql: string) => (this.db.prepare(sql).get() as { n: number }).n;

    const decadeDist = this.db.prepare(
      'SELECT decade, COUNT(*) as n FROM movies GROUP BY decade ORDER BY decade'
    ).all() as { decade: number; n: number }[];

    const certificateDist = this.db.prepare(
      'SELECT certificate, COUNT(*) as n FROM movies GROUP BY certificate ORDER BY n DESC'
    ).all() as { certificate: string | null; n: number }[];

    const genres = this.db.prepare(`
      SELECT g.name as name, COUNT(*) as n
      FROM movie_genres mg JOIN genres g ON g.genre_id = mg.genre_id
      GROUP BY g.genre_id
      ORDER BY n DESC, g.name ASC
      LIMIT ?
    `).all(topGenres) as { name: string; n: number }[];

    return {
      totalMovies: count('SELECT COUNT(*) as n FROM movies'),
      totalGenres: count('SELECT COUNT(*) as n FROM genres'),
      totalAssociations: count('SELECT COUNT(*) as n FROM movie_genres'),
      fromMetadata: count('SELECT COUNT(*) as n FROM movies WHERE from_metadata = 1'),
      fromGenres: count('SELECT COUNT(*) as n FROM movies WHERE from_genres = 1'),
      fromBoth: count('SELECT COUNT(*) as n FROM movies WHERE from_metadata = 1 AND from_genres = 1'),
      withFinancials: count('SELECT COUNT(*) as n FROM movies WHERE from_financial = 1'),
      decadeDist: Object.fromEntries(decadeDist.map(r => [String(r.decade), r.n])),
      certificateDist: Object.fromEntries(certificateDist.map(r => [r.certificate ?? 'none', r.n])),
      topGenres: genres,
    };
  }

  // ──────────────────────────────────────────────────────────────────
  // Run history
  // ──────────────────────────────────────────────────────────────────

  recordRun(summary: RunSummary): number {
    const { report } = summary;
    const result = this.db.prepare(`
      INSERT INTO pipeline_runs (started_at, as_of, dry_run, movies, genres, movie_genres, report)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      summary.startedAt,
      report.asOf,
      summary.dryRun ? 1 : 0,
      report.movies,
      report.genres,
      report.movieGenres,
      JSON.stringify(report)
    );
    return Number(result.lastInsertRowid);
  }

  getLastRun(): PipelineRunRow | undefined {
    return this.db.prepare(
      'SELECT * FROM pipeline_runs ORDER BY id DESC LIMIT 1'
    ).get() as PipelineRunRow | undefined;
  }

  close(): void {
    this.db.close();
  }
}
