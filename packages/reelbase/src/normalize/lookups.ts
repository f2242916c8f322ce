/**
 * Static lookup tables: column unification, certificate remapping, genre
 * vocabulary. Bundled as JSON under data/, extendable from config.
 */

import fs from 'node:fs';
import path from 'node:path';

import { CERTIFICATES } from '../shared/types.js';
import type { Certificate, DatasetKind } from '../shared/types.js';
import { toText } from './values.js';

export interface ColumnSpec {
  /** canonical field → source column aliases, first present wins */
  fields: Record<string, string[]>;
  /** column groups of which at least one member must exist */
  required: string[][];
}

export type ColumnMap = Record<DatasetKind, ColumnSpec>;

export interface LookupOverrides {
  certificates?: Record<string, string>;
  genres?: Record<string, string>;
}

export interface Lookups {
  columns: ColumnMap;
  certificates: CertificateMapper;
  genres: GenreVocabulary;
}

// ── Certificates ───────────────────────────────────────────────────

export function isCertificate(value: string): value is Certificate {
  const all: readonly string[] = CERTIFICATES;
  return all.includes(value);
}

export class CertificateMapper {
  private readonly table = new Map<string, Certificate>();

  constructor(entries: Record<string, string>) {
    for (const [label, target] of Object.entries(entries)) {
      if (!isCertificate(target)) {
        throw new Error(`Certificate map entry "${label}" targets unknown rating "${target}"`);
      }
      this.table.set(label.trim().toUpperCase(), target);
    }
  }

  /** Blank → null; unmapped → UNKNOWN. */
  map(value: unknown): Certificate | null {
    const text = toText(value);
    if (!text) return null;
    return this.table.get(text.toUpperCase()) ?? 'UNKNOWN';
  }
}

// ── Genres ─────────────────────────────────────────────────────────

/** Comparison key: lowercase letters and digits only ("Sci-Fi" → "scifi"). */
export function genreKey(label: string): string {
  return label.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '');
}

function titleCase(label: string): string {
  return label
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/\p{L}+/gu, w => w.charAt(0).toUpperCase() + w.slice(1));
}

/**
 * Open vocabulary: mapped labels collapse onto their canonical name,
 * anything else is kept (title-cased) as its own entry.
 */
export class GenreVocabulary {
  private readonly table = new Map<string, string>();

  constructor(entries: Record<string, string>) {
    for (const [label, canonical] of Object.entries(entries)) {
      this.table.set(genreKey(label), canonical);
    }
  }

  canonical(label: string): string | null {
    const key = genreKey(label);
    if (!key) return null;
    return this.table.get(key) ?? titleCase(label);
  }

  /** Canonicalise and drop repeats (by key), keeping first occurrence. */
  canonicalList(labels: readonly string[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const label of labels) {
      const name = this.canonical(label);
      if (!name) continue;
      const key = genreKey(name);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(name);
    }
    return out;
  }
}

// ── Loading ────────────────────────────────────────────────────────

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new Error(`Cannot load lookup table ${filePath}: ${(err as Error).message}`);
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function parseStringTable(raw: unknown, source: string): Record<string, string> {
  if (!isRecord(raw)) throw new Error(`${source} must be a JSON object`);
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v !== 'string') throw new Error(`${source}: value for "${k}" must be a string`);
    out[k] = v;
  }
  return out;
}

export function parseColumnMap(raw: unknown, source = 'column map'): ColumnMap {
  if (!isRecord(raw)) throw new Error(`${source} must be a JSON object`);

  const parseSpec = (dataset: DatasetKind): ColumnSpec => {
    const spec = raw[dataset];
    if (!isRecord(spec) || !isRecord(spec.fields)) {
      throw new Error(`${source}: "${dataset}.fields" is missing`);
    }
    const fields: Record<string, string[]> = {};
    for (const [field, aliases] of Object.entries(spec.fields)) {
      if (!isStringArray(aliases)) throw new Error(`${source}: ${dataset}.fields.${field} must be a string array`);
      fields[field] = aliases;
    }
    const required = spec.required ?? [];
    if (!Array.isArray(required) || !required.every(isStringArray)) {
      throw new Error(`${source}: ${dataset}.required must be an array of field groups`);
    }
    for (const group of required) {
      for (const field of group) {
        if (!fields[field]) throw new Error(`${source}: ${dataset}.required names unknown field "${field}"`);
      }
    }
    return { fields, required };
  };

  return { metadata: parseSpec('metadata'), genres: parseSpec('genres'), financial: parseSpec('financial') };
}

/** Load the bundled tables from `<baseDir>/data`, merging config overrides on top. */
export function loadLookups(baseDir: string, overrides: LookupOverrides = {}): Lookups {
  const dataDir = path.join(baseDir, 'data');
  const columnsFile = path.join(dataDir, 'column-map.json');
  const certificatesFile = path.join(dataDir, 'certificate-map.json');
  const genresFile = path.join(dataDir, 'genre-map.json');

  const certificates = parseStringTable(readJson(certificatesFile), certificatesFile);
  const genres = parseStringTable(readJson(genresFile), genresFile);

  return {
    columns: parseColumnMap(readJson(columnsFile), columnsFile),
    certificates: new CertificateMapper({ ...certificates, ...overrides.certificates }),
    genres: new GenreVocabulary({ ...genres, ...overrides.genres }),
  };
}
