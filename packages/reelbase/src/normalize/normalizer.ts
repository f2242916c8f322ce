/**
 * Normalizer: RawRecord → NormalizedRecord, one function per dataset.
 * Column names are unified through the column map; titles, years,
 * certificates and genres go through the shared transforms.
 * A row whose year cannot be parsed is rejected as MALFORMED_FIELD.
 */

import type {
  DatasetKind,
  FinancialRecord,
  GenreRecord,
  MetadataRecord,
  NormalizedRecord,
  RawRecord,
  RawTable,
  Rejection,
} from '../shared/types.js';
import type { ColumnSpec, Lookups } from './lookups.js';
import { normalizeTitle } from './title.js';
import { extractYear } from './year.js';
import type { YearRange } from './year.js';
import {
  isBlank,
  isMissing,
  toBoolean,
  toTitleText,
  toInteger,
  toIsoDate,
  toList,
  toNumber,
  toPositiveNumber,
  toRuntime,
  toText,
} from './values.js';

export interface NormalizeContext {
  lookups: Lookups;
  range: YearRange;
}

export type NormalizeOutcome<R> =
  | { ok: true; record: R }
  | { ok: false; rejection: Rejection };

export interface NormalizeResult<R> {
  records: R[];
  rejections: Rejection[];
}

// Where each dataset looks for its year, in order of preference
const DATE_FIELDS: Record<DatasetKind, string[]> = {
  metadata: ['releaseDate', 'year'],
  genres: ['year', 'releaseDate'],
  financial: ['releaseDate', 'year'],
};

// ── Column unification ─────────────────────────────────────────────

/** First alias of `field` that holds a value in this row. */
function pick(raw: RawRecord, spec: ColumnSpec, field: string, missing = isMissing): unknown {
  for (const alias of spec.fields[field] ?? []) {
    if (alias in raw && !missing(raw[alias])) return raw[alias];
  }
  return null;
}

/**
 * Column groups the table cannot satisfy. Each group needs at least one of
 * its fields to be backed by an actual column.
 */
export function checkStructure(table: RawTable, spec: ColumnSpec): string[][] {
  const columns = new Set(table.columns);
  return spec.required.filter(group =>
    !group.some(field => (spec.fields[field] ?? []).some(alias => columns.has(alias)))
  );
}

// ── Shared identity fields ─────────────────────────────────────────

interface Identity {
  rawId: string | null;
  title: string | null;
  normalizedTitle: string | null;
  year: number | null;
}

function readIdentity(
  dataset: DatasetKind,
  raw: RawRecord,
  rowIndex: number,
  spec: ColumnSpec,
  range: YearRange
): { ok: true; identity: Identity } | { ok: false; rejection: Rejection } {
  const title = toTitleText(pick(raw, spec, 'title', isBlank));

  let year: number | null = null;
  const tried: string[] = [];
  for (const field of DATE_FIELDS[dataset]) {
    const value = pick(raw, spec, field);
    if (value == null) continue;
    tried.push(`${field}=${String(value)}`);
    const extracted = extractYear(value, range);
    if (extracted.kind !== 'malformed') {
      year = extracted.year;
      break;
    }
  }

  if (year == null) {
    return {
      ok: false,
      rejection: {
        dataset,
        rowIndex,
        reason: 'MALFORMED_FIELD',
        detail: tried.length > 0
          ? `no year in ${tried.join(', ')}`
          : `no value in ${DATE_FIELDS[dataset].join(' / ')}`,
      },
    };
  }

  return {
    ok: true,
    identity: {
      rawId: toText(pick(raw, spec, 'rawId')),
      title,
      normalizedTitle: normalizeTitle(title),
      year,
    },
  };
}

// ── Per-dataset normalizers ────────────────────────────────────────

export function normalizeMetadata(
  raw: RawRecord,
  rowIndex: number,
  ctx: NormalizeContext
): NormalizeOutcome<MetadataRecord> {
  const spec = ctx.lookups.columns.metadata;
  const id = readIdentity('metadata', raw, rowIndex, spec, ctx.range);
  if (!id.ok) return id;
  const field = (name: string) => pick(raw, spec, name);

  return {
    ok: true,
    record: {
      dataset: 'metadata',
      rowIndex,
      ...id.identity,
      decade: null,
      releaseDate: toIsoDate(field('releaseDate')),
      rating: toNumber(field('rating')),
      votes: toInteger(field('votes')),
      popularity: toNumber(field('popularity')),
      runtime: toRuntime(field('runtime')),
      genres: ctx.lookups.genres.canonicalList(toList(field('genres'))),
      budget: toPositiveNumber(field('budget')),
      revenue: toPositiveNumber(field('revenue')),
      description: toText(field('description')),
      tagline: toText(field('tagline')),
      language: toText(field('language')),
      productionCountries: toText(field('productionCountries')),
      status: toText(field('status')),
      adult: toBoolean(field('adult')),
    },
  };
}

export function normalizeGenres(
  raw: RawRecord,
  rowIndex: number,
  ctx: NormalizeContext
): NormalizeOutcome<GenreRecord> {
  const spec = ctx.lookups.columns.genres;
  const id = readIdentity('genres', raw, rowIndex, spec, ctx.range);
  if (!id.ok) return id;
  const field = (name: string) => pick(raw, spec, name);

  return {
    ok: true,
    record: {
      dataset: 'genres',
      rowIndex,
      ...id.identity,
      decade: null,
      certificate: ctx.lookups.certificates.map(field('certificate')),
      rating: toNumber(field('rating')),
      votes: toInteger(field('votes')),
      runtime: toRuntime(field('runtime')),
      genres: ctx.lookups.genres.canonicalList(toList(field('genres'))),
      description: toText(field('description')),
      director: toText(field('director')),
      stars: toList(field('stars'), /\s*,\s*/),
      totalGross: toPositiveNumber(field('totalGross')),
    },
  };
}

export function normalizeFinancial(
  raw: RawRecord,
  rowIndex: number,
  ctx: NormalizeContext
): NormalizeOutcome<FinancialRecord> {
  const spec = ctx.lookups.columns.financial;
  const id = readIdentity('financial', raw, rowIndex, spec, ctx.range);
  if (!id.ok) return id;
  const field = (name: string) => pick(raw, spec, name);

  return {
    ok: true,
    record: {
      dataset: 'financial',
      rowIndex,
      ...id.identity,
      // The financial catalog has no cross-dataset identifier
      rawId: null,
      decade: null,
      releaseDate: toIsoDate(field('releaseDate')),
      productionBudget: toPositiveNumber(field('productionBudget')),
      domesticGross: toPositiveNumber(field('domesticGross')),
      worldwideGross: toPositiveNumber(field('worldwideGross')),
    },
  };
}

/** Dispatch on dataset kind. */
export function normalizeRecord(
  dataset: DatasetKind,
  raw: RawRecord,
  rowIndex: number,
  ctx: NormalizeContext
): NormalizeOutcome<NormalizedRecord> {
  switch (dataset) {
    case 'metadata': return normalizeMetadata(raw, rowIndex, ctx);
    case 'genres': return normalizeGenres(raw, rowIndex, ctx);
    case 'financial': return normalizeFinancial(raw, rowIndex, ctx);
  }
}

/** Normalize every row of a table, splitting successes from rejections. */
export function normalizeRows<R>(
  rows: readonly RawRecord[],
  normalize: (raw: RawRecord, rowIndex: number) => NormalizeOutcome<R>
): NormalizeResult<R> {
  const result: NormalizeResult<R> = { records: [], rejections: [] };
  rows.forEach((raw, i) => {
    const outcome = normalize(raw, i);
    if (outcome.ok) result.records.push(outcome.record);
    else result.rejections.push(outcome.rejection);
  });
  return result;
}
