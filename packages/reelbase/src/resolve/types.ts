/**
 * Entity resolution: pure interfaces, no DB imports.
 */

import type {
  Clean,
  DatasetKind,
  FinancialRecord,
  GenreRecord,
  MetadataRecord,
  Movie,
} from '../shared/types.js';

export interface ResolveInput {
  metadata: readonly Clean<MetadataRecord>[];
  genres: readonly Clean<GenreRecord>[];
  financial: readonly Clean<FinancialRecord>[];
}

export interface ResolvedMovie {
  movie: Movie;
  // Raw per-dataset genre labels, fed to the SchemaBuilder
  genreLabels: {
    metadata: readonly string[];
    genres: readonly string[];
  };
}

export interface Collision {
  code: 'AMBIGUOUS_FALLBACK_MATCH';
  kind:
    | 'multiple_candidates'   // key matched more than one record; first taken
    | 'key_taken'             // genre-only record whose key an existing Movie holds
    | 'financial_taken';      // Movie already carries financial figures
  key: string;
  dataset: DatasetKind;       // side of the record being placed
  rowIndex: number;
  detail: string;
}

export interface ResolutionStats {
  idMatches: number;
  fallbackMatches: number;
  metadataOnly: number;
  genreOnly: number;
  financialToMetadata: number;
  financialToGenreOnly: number;
  unmatchedFinancial: number;
  collisions: number;
}

export interface ResolveResult {
  movies: ResolvedMovie[];
  collisions: Collision[];
  unmatchedFinancial: Clean<FinancialRecord>[];
  stats: ResolutionStats;
}
