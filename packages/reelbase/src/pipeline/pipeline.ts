/**
 * Pipeline orchestrator.
 * Structure check → per dataset (normalize → filter → dedup → augment)
 * → resolve → genre schema → integrity check → one sink write.
 * Nothing reaches the sink unless every stage completed.
 */

import { addDecade } from '../augment/decade.js';
import { deduplicate } from '../dedup/deduplicator.js';
import type { Lookups } from '../normalize/lookups.js';
import {
  checkStructure,
  normalizeFinancial,
  normalizeGenres,
  normalizeMetadata,
  normalizeRows,
} from '../normalize/normalizer.js';
import type { NormalizeContext, NormalizeOutcome } from '../normalize/normalizer.js';
import { applyQualityFilter, rejectionsOf } from '../quality/filter.js';
import { FINANCIAL_POLICY, GENRES_POLICY, METADATA_POLICY } from '../quality/policies.js';
import type { DatasetPolicy, QualityContext } from '../quality/policies.js';
import { EntityResolver } from '../resolve/resolver.js';
import type { ResolutionStats } from '../resolve/types.js';
import { assertTableIntegrity, buildGenreSchema } from '../schema/genreSchema.js';
import { parseAsOf } from '../shared/config.js';
import { PipelineStructureError } from '../shared/errors.js';
import { RunLogger } from '../shared/logger.js';
import { DATASETS } from '../shared/types.js';
import type {
  Clean,
  DatasetKind,
  NormalizedRecord,
  OutputTables,
  QualityConfig,
  RawRecord,
  RawTable,
  RejectReason,
  TableSink,
} from '../shared/types.js';

export type PipelineInputs = Record<DatasetKind, RawTable>;

export interface PipelineOptions {
  lookups: Lookups;
  quality: QualityConfig;
  /** Storage collaborator. Without one (or on a dry run) nothing is written. */
  sink?: TableSink;
  logger?: RunLogger;
  dryRun?: boolean;
}

export interface DatasetReport {
  rows: number;
  malformed: number;
  rejected: Partial<Record<RejectReason, number>>;
  duplicatesById: number;
  duplicatesByKey: number;
  clean: number;
}

export interface PipelineReport {
  asOf: string;
  datasets: Record<DatasetKind, DatasetReport>;
  resolution: ResolutionStats;
  movies: number;
  genres: number;
  movieGenres: number;
  written: boolean;
}

export interface PipelineResult {
  tables: OutputTables;
  report: PipelineReport;
}

// ── Per-dataset cleaning ───────────────────────────────────────────

interface CleanStage<R extends NormalizedRecord> {
  normalize: (raw: RawRecord, rowIndex: number, ctx: NormalizeContext) => NormalizeOutcome<R>;
  policy: DatasetPolicy<R>;
}

function cleanDataset<R extends NormalizedRecord>(
  table: RawTable,
  stage: CleanStage<R>,
  normalizeCtx: NormalizeContext,
  qualityCtx: QualityContext,
  logger: RunLogger
): { records: Clean<R>[]; report: DatasetReport } {
  const dataset = table.dataset;

  const normalized = normalizeRows(table.rows, (raw, i) => stage.normalize(raw, i, normalizeCtx));
  const filtered = applyQualityFilter(normalized.records, stage.policy, qualityCtx);
  const deduped = deduplicate(filtered.admitted);
  const records = addDecade<R>(deduped.kept);

  const rejected: Partial<Record<RejectReason, number>> = {};
  for (const r of [...normalized.rejections, ...rejectionsOf(filtered.verdicts)]) {
    rejected[r.reason] = (rejected[r.reason] ?? 0) + 1;
    logger.event('info', dataset, r.reason, `row ${r.rowIndex}: ${r.detail}`, { rowIndex: r.rowIndex });
  }

  const report: DatasetReport = {
    rows: table.rows.length,
    malformed: normalized.rejections.length,
    rejected,
    duplicatesById: deduped.droppedById.length,
    duplicatesByKey: deduped.droppedByKey.length,
    clean: records.length,
  };

  const rejectedTotal = Object.values(rejected).reduce((a, b) => a + (b ?? 0), 0);
  logger.info(
    dataset,
    `${report.rows} rows → ${report.clean} clean ` +
      `(${rejectedTotal} rejected, ${report.duplicatesById + report.duplicatesByKey} duplicates)`,
    { ...report }
  );

  return { records, report };
}

// ── Orchestration ──────────────────────────────────────────────────

export function verifyStructure(inputs: PipelineInputs, lookups: Lookups): void {
  for (const dataset of DATASETS) {
    const missing = checkStructure(inputs[dataset], lookups.columns[dataset]);
    if (missing.length > 0) throw new PipelineStructureError(dataset, missing);
  }
}

export function runPipeline(inputs: PipelineInputs, opts: PipelineOptions): PipelineResult {
  const logger = opts.logger ?? new RunLogger({ echo: false });
  const asOf = opts.quality.asOf ? parseAsOf(opts.quality.asOf) : new Date().toISOString().slice(0, 10);

  try {
    verifyStructure(inputs, opts.lookups);
  } catch (err) {
    logger.error('structure', (err as Error).message);
    throw err;
  }

  const range = { minYear: opts.quality.minYear, maxYear: opts.quality.maxYear };
  const normalizeCtx: NormalizeContext = { lookups: opts.lookups, range };
  const qualityCtx: QualityContext = {
    ...range,
    nonCriticalNullThreshold: opts.quality.nonCriticalNullThreshold,
    asOf,
  };

  const metadata = cleanDataset(
    inputs.metadata,
    { normalize: normalizeMetadata, policy: METADATA_POLICY },
    normalizeCtx,
    qualityCtx,
    logger
  );
  const genres = cleanDataset(
    inputs.genres,
    { normalize: normalizeGenres, policy: GENRES_POLICY },
    normalizeCtx,
    qualityCtx,
    logger
  );
  const financial = cleanDataset(
    inputs.financial,
    { normalize: normalizeFinancial, policy: FINANCIAL_POLICY },
    normalizeCtx,
    qualityCtx,
    logger
  );

  const resolved = new EntityResolver().resolve({
    metadata: metadata.records,
    genres: genres.records,
    financial: financial.records,
  });
  for (const c of resolved.collisions) {
    logger.event('warn', 'resolve', c.code, `${c.kind} on "${c.key}" (${c.dataset} row ${c.rowIndex}): ${c.detail}`, {
      kind: c.kind,
      key: c.key,
      dataset: c.dataset,
      rowIndex: c.rowIndex,
    });
  }
  for (const f of resolved.unmatchedFinancial) {
    logger.event('info', 'resolve', 'UNMATCHED_FINANCIAL_RECORD', `no movie for "${f.title}" (${f.year})`, {
      rowIndex: f.rowIndex,
    });
  }
  logger.info('resolve', `${resolved.movies.length} movies resolved`, { ...resolved.stats });

  const schema = buildGenreSchema(resolved.movies);
  const tables: OutputTables = {
    movies: resolved.movies.map(r => r.movie),
    genres: schema.genres,
    movieGenres: schema.movieGenres,
  };
  assertTableIntegrity(tables);
  logger.info('schema', `${tables.genres.length} genres, ${tables.movieGenres.length} associations`);

  let written = false;
  if (opts.sink && !opts.dryRun) {
    opts.sink.writeTables(tables);
    written = true;
    logger.info('store', `wrote ${tables.movies.length} movies`);
  } else {
    logger.info('store', opts.dryRun ? 'dry run, nothing written' : 'no sink configured, nothing written');
  }

  return {
    tables,
    report: {
      asOf,
      datasets: { metadata: metadata.report, genres: genres.report, financial: financial.report },
      resolution: resolved.stats,
      movies: tables.movies.length,
      genres: tables.genres.length,
      movieGenres: tables.movieGenres.length,
      written,
    },
  };
}
