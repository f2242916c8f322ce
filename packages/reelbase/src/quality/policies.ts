/**
 * Per-dataset admission policies: column classification plus the rules that
 * only make sense for one source. Consumed uniformly by applyQualityFilter.
 */

import type {
  FinancialRecord,
  GenreRecord,
  MetadataRecord,
  NormalizedRecordBase,
  RejectReason,
} from '../shared/types.js';

export type ColumnClass = 'critical' | 'non-critical';

export type ColumnPolicy<R> = Partial<Record<keyof R & string, ColumnClass>>;

export interface QualityContext {
  minYear: number;
  maxYear: number;
  nonCriticalNullThreshold: number;
  /** YYYY-MM-DD; releases after this date are not yet released. */
  asOf: string;
}

/** A dataset-specific exclusion. Returns a detail string when violated. */
export interface RecordRule<R> {
  reason: RejectReason;
  violated: (record: R, ctx: QualityContext) => string | null;
}

export interface DatasetPolicy<R extends NormalizedRecordBase> {
  columns: ColumnPolicy<R>;
  rules: RecordRule<R>[];
}

const IDENTITY = {
  title: 'critical',
  normalizedTitle: 'critical',
  year: 'critical',
} as const;

export const METADATA_POLICY: DatasetPolicy<MetadataRecord> = {
  columns: {
    ...IDENTITY,
    releaseDate: 'non-critical',
    rating: 'non-critical',
    votes: 'non-critical',
    popularity: 'non-critical',
    runtime: 'non-critical',
    genres: 'non-critical',
    budget: 'non-critical',
    revenue: 'non-critical',
    description: 'non-critical',
    tagline: 'non-critical',
    language: 'non-critical',
    productionCountries: 'non-critical',
  },
  rules: [
    {
      reason: 'ADULT_CONTENT',
      violated: r => (r.adult === true ? 'adult flag set' : null),
    },
    {
      reason: 'NOT_RELEASED',
      violated: r => (r.status?.toLowerCase() === 'released' ? null : `status ${r.status ?? 'missing'}`),
    },
    {
      reason: 'MISSING_METRICS',
      violated: r =>
        r.runtime == null && r.budget == null && r.revenue == null
          ? 'runtime, budget and revenue all missing'
          : null,
    },
  ],
};

export const GENRES_POLICY: DatasetPolicy<GenreRecord> = {
  columns: {
    ...IDENTITY,
    certificate: 'non-critical',
    rating: 'non-critical',
    votes: 'non-critical',
    runtime: 'non-critical',
    genres: 'non-critical',
    description: 'non-critical',
    director: 'non-critical',
    stars: 'non-critical',
    totalGross: 'non-critical',
  },
  rules: [],
};

export const FINANCIAL_POLICY: DatasetPolicy<FinancialRecord> = {
  columns: {
    ...IDENTITY,
    releaseDate: 'non-critical',
    productionBudget: 'non-critical',
    domesticGross: 'non-critical',
    worldwideGross: 'non-critical',
  },
  rules: [
    {
      reason: 'NOT_RELEASED',
      violated: (r, ctx) =>
        r.releaseDate != null && r.releaseDate > ctx.asOf
          ? `release date ${r.releaseDate} after ${ctx.asOf}`
          : null,
    },
  ],
};
