/**
 * Configuration loader for reelbase
 * Loads from YAML config file with environment variable expansion
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import { toIsoDate } from '../normalize/values.js';
import { CERTIFICATES, DATASETS } from './types.js';
import type { DatasetKind, QualityConfig, ReelbaseConfig } from './types.js';

const DEFAULT_INPUTS: Record<DatasetKind, string> = {
  metadata: 'data/raw/tmdb_movies',
  genres: 'data/raw/genres',
  financial: 'data/raw/budgets',
};

export const DEFAULT_QUALITY: QualityConfig = {
  minYear: 1880,
  maxYear: 2025,
  nonCriticalNullThreshold: 0.8,
};

interface RawConfig {
  inputs?: Partial<Record<DatasetKind, string>>;
  storage?: { dbPath?: string };
  logging?: { dir?: string; echo?: boolean };
  quality?: Partial<QualityConfig>;
  lookups?: {
    certificates?: Record<string, string>;
    genres?: Record<string, string>;
  };
}

/**
 * Expand environment variables in a string
 * Supports ${VAR} syntax
 */
function expandEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? '');
}

/**
 * Recursively expand environment variables in an object
 */
function deepExpand(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(deepExpand);
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = deepExpand(v);
    }
    return out;
  }
  return expandEnv(obj);
}

/**
 * Find config file from multiple candidate locations
 */
function findConfigFile(baseDir: string): string | null {
  const candidates = [
    process.env.REELBASE_CONFIG,
    path.join(baseDir, 'config/config.yaml'),
    path.join(process.cwd(), 'reelbase.yaml'),
    path.join(baseDir, 'config/config.example.yaml'),
  ].filter((c): c is string => Boolean(c));

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function stringMap(value: unknown, key: string): Record<string, string> {
  if (value == null) return {};
  if (!isRecord(value)) throw new Error(`${key} must be a mapping of label → canonical name`);
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v !== 'string') throw new Error(`${key}.${k} must be a string`);
    out[k] = v;
  }
  return out;
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value == null || value === '') return undefined;
  if (typeof value !== 'string') throw new Error(`${key} must be a string`);
  return value;
}

function optionalNumber(value: unknown, key: string): number | undefined {
  if (value == null || value === '') return undefined;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) throw new Error(`${key} must be a number`);
  return n;
}

function readRawConfig(parsed: unknown): RawConfig {
  if (parsed == null) return {};
  if (!isRecord(parsed)) throw new Error('Config root must be a mapping');

  const inputs: Partial<Record<DatasetKind, string>> = {};
  const rawInputs = parsed.inputs;
  if (rawInputs != null) {
    if (!isRecord(rawInputs)) throw new Error('inputs must be a mapping');
    for (const dataset of DATASETS) {
      const value = optionalString(rawInputs[dataset], `inputs.${dataset}`);
      if (value) inputs[dataset] = value;
    }
  }

  const storage = isRecord(parsed.storage) ? parsed.storage : {};
  const logging = isRecord(parsed.logging) ? parsed.logging : {};
  const quality = isRecord(parsed.quality) ? parsed.quality : {};
  const lookups = isRecord(parsed.lookups) ? parsed.lookups : {};

  let echo: boolean | undefined;
  if (typeof logging.echo === 'boolean') echo = logging.echo;
  else if (logging.echo != null) throw new Error('logging.echo must be true or false');

  return {
    inputs,
    storage: { dbPath: optionalString(storage.dbPath, 'storage.dbPath') },
    logging: { dir: optionalString(logging.dir, 'logging.dir'), echo },
    quality: {
      minYear: optionalNumber(quality.minYear, 'quality.minYear'),
      maxYear: optionalNumber(quality.maxYear, 'quality.maxYear'),
      nonCriticalNullThreshold: optionalNumber(quality.nonCriticalNullThreshold, 'quality.nonCriticalNullThreshold'),
      asOf: optionalString(quality.asOf, 'quality.asOf'),
    },
    lookups: {
      certificates: stringMap(lookups.certificates, 'lookups.certificates'),
      genres: stringMap(lookups.genres, 'lookups.genres'),
    },
  };
}

/**
 * Release dates are compared as YYYY-MM-DD strings, so every cut-off date is
 * brought into that form ("2024/06/30", "June 30 2024" → "2024-06-30").
 */
export function parseAsOf(value: string, key = 'quality.asOf'): string {
  const iso = toIsoDate(value);
  if (!iso) throw new Error(`${key} is not a valid date: ${value}`);
  return iso;
}

/**
 * Build a validated config with defaults from already-parsed YAML.
 * Relative paths resolve against baseDir.
 */
export function buildConfig(parsed: unknown, baseDir: string): ReelbaseConfig {
  const raw = readRawConfig(deepExpand(parsed));
  const resolvePath = (p: string) => (p === ':memory:' || path.isAbsolute(p) ? p : path.join(baseDir, p));

  const asOf = raw.quality?.asOf;
  const quality: QualityConfig = {
    minYear: raw.quality?.minYear ?? DEFAULT_QUALITY.minYear,
    maxYear: raw.quality?.maxYear ?? DEFAULT_QUALITY.maxYear,
    nonCriticalNullThreshold: raw.quality?.nonCriticalNullThreshold ?? DEFAULT_QUALITY.nonCriticalNullThreshold,
    asOf: asOf ? parseAsOf(asOf) : undefined,
  };

  if (quality.minYear > quality.maxYear) {
    throw new Error('quality.minYear must not be greater than quality.maxYear');
  }
  if (quality.nonCriticalNullThreshold < 0 || quality.nonCriticalNullThreshold > 1) {
    throw new Error('quality.nonCriticalNullThreshold must be between 0 and 1');
  }

  const certificates = raw.lookups?.certificates ?? {};
  const allowed: readonly string[] = CERTIFICATES;
  for (const [label, target] of Object.entries(certificates)) {
    if (!allowed.includes(target)) {
      throw new Error(`lookups.certificates.${label}: "${target}" is not one of ${CERTIFICATES.join(', ')}`);
    }
  }

  return {
    inputs: {
      metadata: resolvePath(raw.inputs?.metadata ?? DEFAULT_INPUTS.metadata),
      genres: resolvePath(raw.inputs?.genres ?? DEFAULT_INPUTS.genres),
      financial: resolvePath(raw.inputs?.financial ?? DEFAULT_INPUTS.financial),
    },
    storage: {
      dbPath: resolvePath(raw.storage?.dbPath ?? 'data/processed/movies.sqlite'),
    },
    logging: {
      dir: resolvePath(raw.logging?.dir ?? 'data/logs'),
      echo: raw.logging?.echo ?? true,
    },
    quality,
    lookups: {
      certificates,
      genres: raw.lookups?.genres ?? {},
    },
  };
}

/**
 * Load and validate configuration
 */
export function loadConfig(baseDir: string, explicitPath?: string): ReelbaseConfig {
  const configPath = explicitPath ?? findConfigFile(baseDir);

  if (!configPath) {
    throw new Error(
      'No config file found. Create config/config.yaml or set REELBASE_CONFIG env var.'
    );
  }
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  return buildConfig(parse(content), baseDir);
}

/**
 * Get config file path for display
 */
export function getConfigPath(baseDir: string): string | null {
  return findConfigFile(baseDir);
}
