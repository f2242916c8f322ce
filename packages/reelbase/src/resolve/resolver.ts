/**
 * EntityResolver: pure, no DB writes, no logging.
 * Merges the three clean datasets into Movies:
 *   A. metadata ↔ genre pairing on the shared native id
 *   B. remaining metadata ↔ unclaimed genre records on the fallback key
 *   C. leftover genre records become genre-only Movies
 * then attaches financial figures, metadata-derived Movies first.
 */

import type { Clean, FinancialRecord, GenreRecord, MetadataRecord } from '../shared/types.js';
import {
  buildIndex,
  candidatesFor,
  freezeMovie,
  keyOf,
  movieFromGenre,
  movieFromMetadata,
} from './strategies.js';
import type { KeyIndex, MovieDraft } from './strategies.js';
import type {
  Collision,
  ResolutionStats,
  ResolveInput,
  ResolveResult,
  ResolvedMovie,
} from './types.js';

interface Entry {
  draft: MovieDraft;
  key: string;
  genreLabels: ResolvedMovie['genreLabels'];
}

function emptyStats(): ResolutionStats {
  return {
    idMatches: 0,
    fallbackMatches: 0,
    metadataOnly: 0,
    genreOnly: 0,
    financialToMetadata: 0,
    financialToGenreOnly: 0,
    unmatchedFinancial: 0,
    collisions: 0,
  };
}

export class EntityResolver {
  private collisions: Collision[] = [];
  private stats: ResolutionStats = emptyStats();

  resolve(input: ResolveInput): ResolveResult {
    this.collisions = [];
    this.stats = emptyStats();

    const pairs = this.pairPrimary(input.metadata, input.genres);

    let nextId = 1;
    const fromMetadata: Entry[] = input.metadata.map(meta => {
      const genre = pairs.get(meta) ?? null;
      if (!genre) this.stats.metadataOnly++;
      return {
        draft: movieFromMetadata(nextId++, meta, genre),
        key: keyOf(meta),
        genreLabels: { metadata: meta.genres, genres: genre?.genres ?? [] },
      };
    });

    const claimed = new Set<Clean<GenreRecord>>(pairs.values());
    const heldKeys = new Map<string, Entry>(fromMetadata.map(e => [e.key, e]));
    const genreOnly: Entry[] = [];

    // Pass C
    for (const genre of input.genres) {
      if (claimed.has(genre)) continue;
      const key = keyOf(genre);
      const holder = heldKeys.get(key);
      if (holder) {
        this.collide({
          kind: 'key_taken',
          key,
          dataset: 'genres',
          rowIndex: genre.rowIndex,
          detail: `key already held by movie ${holder.draft.movieId}; record dropped`,
        });
        continue;
      }
      const entry: Entry = {
        draft: movieFromGenre(nextId++, genre),
        key,
        genreLabels: { metadata: [], genres: genre.genres },
      };
      heldKeys.set(key, entry);
      genreOnly.push(entry);
      this.stats.genreOnly++;
    }

    const unmatchedFinancial = this.attachFinancials(input.financial, fromMetadata, genreOnly);

    const movies = [...fromMetadata, ...genreOnly].map(e => ({
      movie: freezeMovie(e.draft),
      genreLabels: e.genreLabels,
    }));

    return { movies, collisions: this.collisions, unmatchedFinancial, stats: this.stats };
  }

  // ── Passes A and B ───────────────────────────────────────────────

  private pairPrimary(
    metadata: readonly Clean<MetadataRecord>[],
    genres: readonly Clean<GenreRecord>[]
  ): Map<Clean<MetadataRecord>, Clean<GenreRecord>> {
    const pairs = new Map<Clean<MetadataRecord>, Clean<GenreRecord>>();
    const claimed = new Set<Clean<GenreRecord>>();

    const byId = buildIndex(genres, g => g.rawId);
    for (const meta of metadata) {
      if (meta.rawId == null) continue;
      const genre = candidatesFor(byId, meta.rawId).find(g => !claimed.has(g));
      if (!genre) continue;
      pairs.set(meta, genre);
      claimed.add(genre);
      this.stats.idMatches++;
    }

    const byKey = buildIndex(genres, keyOf);
    for (const meta of metadata) {
      if (pairs.has(meta)) continue;
      const key = keyOf(meta);
      const open = candidatesFor(byKey, key).filter(g => !claimed.has(g));
      if (open.length === 0) continue;
      const [first] = open;
      if (open.length > 1) {
        this.collide({
          kind: 'multiple_candidates',
          key,
          dataset: 'metadata',
          rowIndex: meta.rowIndex,
          detail: `${open.length} genre records match; took row ${first.rowIndex}`,
        });
      }
      pairs.set(meta, first);
      claimed.add(first);
      this.stats.fallbackMatches++;
    }

    return pairs;
  }

  // ── Financial augmentation ───────────────────────────────────────

  private attachFinancials(
    financial: readonly Clean<FinancialRecord>[],
    fromMetadata: readonly Entry[],
    genreOnly: readonly Entry[]
  ): Clean<FinancialRecord>[] {
    const tiers: { index: KeyIndex<Entry>; counter: 'financialToMetadata' | 'financialToGenreOnly' }[] = [
      { index: buildIndex(fromMetadata, e => e.key), counter: 'financialToMetadata' },
      { index: buildIndex(genreOnly, e => e.key), counter: 'financialToGenreOnly' },
    ];
    const unmatched: Clean<FinancialRecord>[] = [];

    for (const record of financial) {
      const key = keyOf(record);
      const tier = tiers.find(t => candidatesFor(t.index, key).length > 0);
      if (!tier) {
        unmatched.push(record);
        this.stats.unmatchedFinancial++;
        continue;
      }

      const candidates = candidatesFor(tier.index, key);
      const [target] = candidates;
      if (candidates.length > 1) {
        this.collide({
          kind: 'multiple_candidates',
          key,
          dataset: 'financial',
          rowIndex: record.rowIndex,
          detail: `${candidates.length} movies match; took movie ${target.draft.movieId}`,
        });
      }
      if (target.draft.provenance.financial) {
        this.collide({
          kind: 'financial_taken',
          key,
          dataset: 'financial',
          rowIndex: record.rowIndex,
          detail: `movie ${target.draft.movieId} already has financial figures; record dropped`,
        });
        continue;
      }

      target.draft.productionBudget = record.productionBudget;
      target.draft.domesticGross = record.domesticGross;
      target.draft.worldwideGross = record.worldwideGross;
      target.draft.provenance = { ...target.draft.provenance, financial: true };
      this.stats[tier.counter]++;
    }

    return unmatched;
  }

  private collide(c: Omit<Collision, 'code'>): void {
    this.collisions.push({ code: 'AMBIGUOUS_FALLBACK_MATCH', ...c });
    this.stats.collisions++;
  }
}

/** Convenience wrapper for one-shot resolution. */
export function resolveEntities(input: ResolveInput): ResolveResult {
  return new EntityResolver().resolve(input);
}
