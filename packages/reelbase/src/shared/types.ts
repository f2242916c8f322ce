/**
 * reelbase shared types
 * Raw inputs, per-dataset normalized records, resolved entities, output tables.
 */

// ============================================================================
// Configuration
// ============================================================================

export interface ReelbaseConfig {
  // Raw dataset locations (a CSV file or a folder of CSV files)
  inputs: Record<DatasetKind, string>;

  storage: {
    dbPath: string;
  };

  logging: {
    dir: string;
    echo: boolean;
  };

  quality: QualityConfig;

  // Extra label → canonical entries merged over the bundled lookup tables
  lookups: {
    certificates: Record<string, string>;
    genres: Record<string, string>;
  };
}

export interface QualityConfig {
  minYear: number;
  maxYear: number;
  nonCriticalNullThreshold: number;  // 0..1, reject when the missing fraction exceeds it
  asOf?: string;                     // ISO date; unreleased cut-off for financial rows
}

// ============================================================================
// Raw input
// ============================================================================

export type DatasetKind = 'metadata' | 'genres' | 'financial';

export const DATASETS: readonly DatasetKind[] = ['metadata', 'genres', 'financial'];

/** One source row: column name → raw value, as read. */
export type RawRecord = Record<string, unknown>;

export interface RawTable {
  dataset: DatasetKind;
  columns: string[];
  rows: RawRecord[];
}

// ============================================================================
// Normalized records
// ============================================================================

export const CERTIFICATES = [
  'G',
  'PG',
  'PG-13',
  'R',
  'NC-17',
  'Approved',
  'Passed',
  'Unrated',
  'NR',
  'UNKNOWN',
] as const;

export type Certificate = (typeof CERTIFICATES)[number];

export interface NormalizedRecordBase {
  dataset: DatasetKind;
  rowIndex: number;               // position in the stacked raw table
  rawId: string | null;           // source-native identifier
  title: string | null;
  normalizedTitle: string | null;
  year: number | null;            // may be out of range until QualityFilter runs
  decade: number | null;          // set by the Augmenter
}

export interface MetadataRecord extends NormalizedRecordBase {
  dataset: 'metadata';
  releaseDate: string | null;
  rating: number | null;
  votes: number | null;
  popularity: number | null;
  runtime: number | null;
  genres: string[];
  budget: number | null;
  revenue: number | null;
  description: string | null;
  tagline: string | null;
  language: string | null;
  productionCountries: string | null;
  status: string | null;
  adult: boolean | null;
}

export interface GenreRecord extends NormalizedRecordBase {
  dataset: 'genres';
  certificate: Certificate | null;
  rating: number | null;
  votes: number | null;
  runtime: number | null;
  genres: string[];
  description: string | null;
  director: string | null;
  stars: string[];
  totalGross: number | null;
}

export interface FinancialRecord extends NormalizedRecordBase {
  dataset: 'financial';
  releaseDate: string | null;
  productionBudget: number | null;
  domesticGross: number | null;
  worldwideGross: number | null;
}

export type NormalizedRecord = MetadataRecord | GenreRecord | FinancialRecord;

/** A record that passed the QualityFilter: identity fields are present and valid. */
export type Admitted<R extends NormalizedRecordBase> = R & {
  title: string;
  normalizedTitle: string;
  year: number;
};

/** An admitted record after augmentation. */
export type Clean<R extends NormalizedRecordBase> = Admitted<R> & {
  decade: number;
};

// ============================================================================
// Diagnostics
// ============================================================================

export type RejectReason =
  | 'MALFORMED_FIELD'
  | 'CRITICAL_NULL'
  | 'YEAR_OUT_OF_RANGE'
  | 'ADULT_CONTENT'
  | 'NOT_RELEASED'
  | 'MISSING_METRICS'
  | 'NON_CRITICAL_THRESHOLD_EXCEEDED';

export type DiagnosticCode =
  | RejectReason
  | 'AMBIGUOUS_FALLBACK_MATCH'
  | 'UNMATCHED_FINANCIAL_RECORD';

export interface Rejection {
  dataset: DatasetKind;
  rowIndex: number;
  reason: RejectReason;
  detail: string;
}

// ============================================================================
// Resolved entities and output tables
// ============================================================================

export interface Provenance {
  readonly metadata: boolean;
  readonly genres: boolean;
  readonly financial: boolean;
}

export interface Movie {
  readonly movieId: number;
  readonly imdbId: string | null;
  readonly title: string;
  readonly normalizedTitle: string;
  readonly year: number;
  readonly decade: number;
  readonly releaseDate: string | null;
  readonly certificate: Certificate | null;
  readonly rating: number | null;
  readonly votes: number | null;
  readonly popularity: number | null;
  readonly runtime: number | null;
  readonly description: string | null;
  readonly director: string | null;
  readonly language: string | null;
  readonly productionCountries: string | null;
  // Financial figures: present only when a financial record matched
  readonly productionBudget: number | null;
  readonly domesticGross: number | null;
  readonly worldwideGross: number | null;
  readonly provenance: Provenance;
}

export interface Genre {
  readonly genreId: number;
  readonly name: string;
}

export interface MovieGenre {
  readonly movieId: number;
  readonly genreId: number;
}

export interface OutputTables {
  movies: readonly Movie[];
  genres: readonly Genre[];
  movieGenres: readonly MovieGenre[];
}

/** Storage collaborator: receives the complete set of tables once per run. */
export interface TableSink {
  writeTables(tables: OutputTables): void;
}
