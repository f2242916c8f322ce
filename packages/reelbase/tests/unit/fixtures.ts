import { fileURLToPath } from 'node:url';

import { decadeOf } from '../../src/augment/decade.js';
import { loadLookups } from '../../src/normalize/lookups.js';
import { normalizeTitle } from '../../src/normalize/title.js';
import type {
  Clean,
  DatasetKind,
  FinancialRecord,
  GenreRecord,
  MetadataRecord,
  NormalizedRecordBase,
  RawRecord,
  RawTable,
} from '../../src/shared/types.js';

/** packages/reelbase, where data/ lives */
export const BASE_DIR = fileURLToPath(new URL('../..', import.meta.url));

export const lookups = loadLookups(BASE_DIR);

export const RANGE = { minYear: 1880, maxYear: 2025 };

interface Identity {
  title: string;
  year: number;
  rawId?: string | null;
  rowIndex?: number;
}

type Payload<R> = Partial<Omit<R, keyof NormalizedRecordBase>>;

function identity(id: Identity) {
  return {
    rowIndex: id.rowIndex ?? 0,
    rawId: id.rawId ?? null,
    title: id.title,
    normalizedTitle: normalizeTitle(id.title) ?? id.title,
    year: id.year,
    decade: decadeOf(id.year),
  };
}

export function metaRecord(id: Identity, payload: Payload<MetadataRecord> = {}): Clean<MetadataRecord> {
  return {
    dataset: 'metadata',
    ...identity(id),
    releaseDate: null,
    rating: null,
    votes: null,
    popularity: null,
    runtime: null,
    genres: [],
    budget: null,
    revenue: null,
    description: null,
    tagline: null,
    language: null,
    productionCountries: null,
    status: 'Released',
    adult: false,
    ...payload,
  };
}

export function genreRecord(id: Identity, payload: Payload<GenreRecord> = {}): Clean<GenreRecord> {
  return {
    dataset: 'genres',
    ...identity(id),
    certificate: null,
    rating: null,
    votes: null,
    runtime: null,
    genres: [],
    description: null,
    director: null,
    stars: [],
    totalGross: null,
    ...payload,
  };
}

export function financialRecord(id: Identity, payload: Payload<FinancialRecord> = {}): Clean<FinancialRecord> {
  return {
    dataset: 'financial',
    ...identity(id),
    rawId: null,
    releaseDate: null,
    productionBudget: null,
    domesticGross: null,
    worldwideGross: null,
    ...payload,
  };
}

/** Raw table whose columns are the union of the rows' keys. */
export function rawTable(dataset: DatasetKind, rows: RawRecord[]): RawTable {
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return { dataset, columns, rows };
}

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
