/**
 * SchemaBuilder: Genre lookup table and MovieGenre associations.
 * Genre ids follow first-occurrence order over the resolved Movies, so
 * identical inputs always produce identical ids.
 */

import { genreKey } from '../normalize/lookups.js';
import { fallbackKey } from '../normalize/title.js';
import { TableIntegrityError } from '../shared/errors.js';
import type { Genre, MovieGenre, OutputTables } from '../shared/types.js';
import type { ResolvedMovie } from '../resolve/types.js';

export interface GenreSchema {
  genres: Genre[];
  movieGenres: MovieGenre[];
}

/**
 * Labels arrive already canonical from the normalizer; they are only
 * deduplicated by key here, never remapped a second time.
 */
export function buildGenreSchema(resolved: readonly ResolvedMovie[]): GenreSchema {
  const idsByKey = new Map<string, number>();
  const genres: Genre[] = [];
  const labelKeys: { movieId: number; keys: string[] }[] = [];

  // Finalise the genre table before any association row exists
  for (const { movie, genreLabels } of resolved) {
    const keys: string[] = [];
    for (const name of [...genreLabels.metadata, ...genreLabels.genres]) {
      const key = genreKey(name);
      if (!key) continue;
      if (!idsByKey.has(key)) {
        const genre: Genre = Object.freeze({ genreId: genres.length + 1, name });
        genres.push(genre);
        idsByKey.set(key, genre.genreId);
      }
      keys.push(key);
    }
    labelKeys.push({ movieId: movie.movieId, keys });
  }

  const movieGenres: MovieGenre[] = [];
  for (const { movieId, keys } of labelKeys) {
    const seen = new Set<number>();
    for (const key of keys) {
      const genreId = idsByKey.get(key);
      if (genreId === undefined || seen.has(genreId)) continue;
      seen.add(genreId);
      movieGenres.push(Object.freeze({ movieId, genreId }));
    }
  }

  return { genres, movieGenres };
}

/** Collect every key and reference violation; throws when any exist. */
export function assertTableIntegrity(tables: OutputTables): void {
  const violations: string[] = [];

  const movieIds = new Set<number>();
  const keys = new Set<string>();
  for (const m of tables.movies) {
    if (movieIds.has(m.movieId)) violations.push(`duplicate movie id ${m.movieId}`);
    movieIds.add(m.movieId);
    const key = fallbackKey(m.normalizedTitle, m.year);
    if (keys.has(key)) violations.push(`duplicate fallback key ${key}`);
    keys.add(key);
  }

  const genreIds = new Set<number>();
  const names = new Set<string>();
  for (const g of tables.genres) {
    if (genreIds.has(g.genreId)) violations.push(`duplicate genre id ${g.genreId}`);
    genreIds.add(g.genreId);
    const key = genreKey(g.name);
    if (names.has(key)) violations.push(`duplicate genre name ${g.name}`);
    names.add(key);
  }

  const pairs = new Set<string>();
  for (const mg of tables.movieGenres) {
    if (!movieIds.has(mg.movieId)) violations.push(`association references missing movie ${mg.movieId}`);
    if (!genreIds.has(mg.genreId)) violations.push(`association references missing genre ${mg.genreId}`);
    const pair = `${mg.movieId}:${mg.genreId}`;
    if (pairs.has(pair)) violations.push(`duplicate association ${pair}`);
    pairs.add(pair);
  }

  if (violations.length > 0) throw new TableIntegrityError(violations);
}
