/**
 * Matching strategies: pure functions over stable input order.
 * Compound-key lookups return every candidate; callers take the first.
 */

import { fallbackKey } from '../normalize/title.js';
import type {
  Clean,
  GenreRecord,
  MetadataRecord,
  Movie,
  NormalizedRecordBase,
  Provenance,
} from '../shared/types.js';

// ── Indexes ────────────────────────────────────────────────────────

export type KeyIndex<T> = ReadonlyMap<string, readonly T[]>;

export function keyOf(record: Clean<NormalizedRecordBase>): string {
  return fallbackKey(record.normalizedTitle, record.year);
}

/** Group items by key, each bucket in input order. */
export function buildIndex<T>(items: readonly T[], key: (item: T) => string | null): KeyIndex<T> {
  const index = new Map<string, T[]>();
  for (const item of items) {
    const k = key(item);
    if (k == null) continue;
    const bucket = index.get(k);
    if (bucket) bucket.push(item);
    else index.set(k, [item]);
  }
  return index;
}

/** `(normalized_title, year)` → candidate set, input order. */
export function candidatesFor<T>(index: KeyIndex<T>, key: string): readonly T[] {
  return index.get(key) ?? [];
}

// ── Movie assembly ─────────────────────────────────────────────────

export type MovieDraft = { -readonly [K in keyof Movie]: Movie[K] };

const NO_FINANCIALS = {
  productionBudget: null,
  domesticGross: null,
  worldwideGross: null,
} as const;

function provenance(metadata: boolean, genres: boolean): Provenance {
  return { metadata, genres, financial: false };
}

/** Metadata-derived Movie, optionally paired with its genre record. */
export function movieFromMetadata(
  movieId: number,
  meta: Clean<MetadataRecord>,
  genre: Clean<GenreRecord> | null
): MovieDraft {
  return {
    movieId,
    imdbId: meta.rawId ?? genre?.rawId ?? null,
    title: meta.title,
    normalizedTitle: meta.normalizedTitle,
    year: meta.year,
    decade: meta.decade,
    releaseDate: meta.releaseDate,
    certificate: genre?.certificate ?? null,
    rating: meta.rating ?? genre?.rating ?? null,
    votes: meta.votes ?? genre?.votes ?? null,
    popularity: meta.popularity,
    runtime: meta.runtime ?? genre?.runtime ?? null,
    description: meta.description ?? genre?.description ?? null,
    director: genre?.director ?? null,
    language: meta.language,
    productionCountries: meta.productionCountries,
    ...NO_FINANCIALS,
    provenance: provenance(true, genre != null),
  };
}

export function movieFromGenre(movieId: number, genre: Clean<GenreRecord>): MovieDraft {
  return {
    movieId,
    imdbId: genre.rawId,
    title: genre.title,
    normalizedTitle: genre.normalizedTitle,
    year: genre.year,
    decade: genre.decade,
    releaseDate: null,
    certificate: genre.certificate,
    rating: genre.rating,
    votes: genre.votes,
    popularity: null,
    runtime: genre.runtime,
    description: genre.description,
    director: genre.director,
    language: null,
    productionCountries: null,
    ...NO_FINANCIALS,
    provenance: provenance(false, true),
  };
}

export function freezeMovie(draft: MovieDraft): Movie {
  return Object.freeze({ ...draft, provenance: Object.freeze({ ...draft.provenance }) });
}
