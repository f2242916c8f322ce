/**
 * Dataset report
 * Summarises the stored tables and the last pipeline run.
 */

import { bold, cyan, dim, green, yellow } from 'colorette';

import type { DbStats, MovieDb, PipelineRunRow } from '../db/client.js';
import type { PipelineReport } from '../pipeline/pipeline.js';
import { DATASETS } from '../shared/types.js';

const pct = (n: number, of: number) => `${Math.round((n / Math.max(1, of)) * 100)}%`;

function section(title: string): string {
  return cyan(`\n── ${title} ${'─'.repeat(Math.max(4, 56 - title.length))}`);
}

function bar(count: number, total: number): string {
  return '█'.repeat(Math.round((count / Math.max(1, total)) * 30));
}

export function renderStatus(stats: DbStats, lastRun?: PipelineRunRow): string[] {
  const lines: string[] = [];
  const total = stats.totalMovies;

  lines.push(section('Movies'));
  lines.push(`  Movies        : ${bold(String(total))}`);
  lines.push(`  Genres        : ${stats.totalGenres}`);
  lines.push(`  Associations  : ${stats.totalAssociations}`);

  lines.push(section('Provenance'));
  lines.push(`  Metadata      : ${stats.fromMetadata} (${pct(stats.fromMetadata, total)})`);
  lines.push(`  Genre catalog : ${stats.fromGenres} (${pct(stats.fromGenres, total)})`);
  lines.push(`  Both          : ${stats.fromBoth} (${pct(stats.fromBoth, total)})`);
  const coverage = `${stats.withFinancials} (${pct(stats.withFinancials, total)})`;
  lines.push(`  Financials    : ${stats.withFinancials > 0 ? green(coverage) : yellow(coverage)}`);

  lines.push(section('Decades'));
  for (const [decade, n] of Object.entries(stats.decadeDist)) {
    lines.push(`  ${`${decade}s`.padEnd(8)} ${String(n).padStart(6)}  ${dim(bar(n, total))}`);
  }

  lines.push(section('Certificates'));
  for (const [cert, n] of Object.entries(stats.certificateDist)) {
    lines.push(`  ${cert.padEnd(10)} ${String(n).padStart(6)}`);
  }

  lines.push(section('Top genres'));
  for (const g of stats.topGenres) {
    lines.push(`  ${g.name.padEnd(14)} ${String(g.n).padStart(6)}`);
  }

  if (lastRun) {
    lines.push(section('Last run'));
    lines.push(`  Finished      : ${lastRun.finished_at}`);
    lines.push(`  As of         : ${lastRun.as_of}`);
    lines.push(`  Dry run       : ${lastRun.dry_run ? 'yes' : 'no'}`);
    lines.push(`  Tables        : ${lastRun.movies} movies, ${lastRun.genres} genres, ${lastRun.movie_genres} links`);
  }

  lines.push('');
  return lines;
}

/** Per-dataset funnel and resolution counts of one run. */
export function renderRunSummary(report: PipelineReport): string[] {
  const lines: string[] = [section('Datasets')];
  for (const dataset of DATASETS) {
    const d = report.datasets[dataset];
    const rejected = Object.entries(d.rejected)
      .map(([reason, n]) => `${reason}=${n}`)
      .join(' ');
    lines.push(
      `  ${dataset.padEnd(10)} rows=${d.rows} clean=${d.clean} ` +
        `dupes=${d.duplicatesById}+${d.duplicatesByKey}${rejected ? ` ${dim(rejected)}` : ''}`
    );
  }

  const r = report.resolution;
  lines.push(section('Resolution'));
  lines.push(`  Paired        : ${r.idMatches} by id, ${r.fallbackMatches} by title+year`);
  lines.push(`  Single source : ${r.metadataOnly} metadata-only, ${r.genreOnly} genre-only`);
  lines.push(`  Financials    : ${r.financialToMetadata + r.financialToGenreOnly} attached, ${r.unmatchedFinancial} unmatched`);
  lines.push(`  Collisions    : ${r.collisions > 0 ? yellow(String(r.collisions)) : '0'}`);
  lines.push(
    `  Output        : ${report.movies} movies, ${report.genres} genres, ${report.movieGenres} links` +
      (report.written ? '' : dim(' (not written)'))
  );
  lines.push('');
  return lines;
}

export function printStatus(db: MovieDb, limit = 10): void {
  for (const line of renderStatus(db.getStats(limit), db.getLastRun())) {
    console.log(line);
  }
}
