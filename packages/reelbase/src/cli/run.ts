/**
 * reelbase run
 * Read the three raw datasets, build the relational tables, store them.
 */

import { Command } from 'commander';
import { red } from 'colorette';

import { MovieDb } from '../db/client.js';
import { readDataset } from '../ingest/csv.js';
import { loadLookups } from '../normalize/lookups.js';
import { runPipeline } from '../pipeline/pipeline.js';
import type { PipelineInputs } from '../pipeline/pipeline.js';
import { renderRunSummary } from '../report/report.js';
import { loadConfig, parseAsOf } from '../shared/config.js';
import { RunLogger } from '../shared/logger.js';

interface RunOptions {
  config?: string;
  db?: string;
  asOf?: string;
  dryRun?: boolean;
}

export function makeRunCommand(baseDir: string): Command {
  return new Command('run')
    .description('Normalize, filter, deduplicate and merge the raw datasets into SQLite')
    .option('-c, --config <path>', 'Config file (default: search config/config.yaml, reelbase.yaml)')
    .option('-d, --db <path>', 'SQLite DB path (overrides storage.dbPath)')
    .option('--as-of <date>', 'Treat releases after this date as unreleased (default: today)')
    .option('--dry-run', 'Run every stage but write nothing to the DB')
    .action((opts: RunOptions) => {
      const startedAt = new Date().toISOString();
      const dryRun = Boolean(opts.dryRun);
      let logger: RunLogger | undefined;
      let db: MovieDb | undefined;

      try {
        const config = loadConfig(baseDir, opts.config);
        const asOf = opts.asOf ? parseAsOf(opts.asOf, '--as-of') : config.quality.asOf;
        const quality = { ...config.quality, asOf };
        const dbPath = opts.db ?? config.storage.dbPath;

        logger = new RunLogger({ logDir: config.logging.dir, echo: config.logging.echo });
        logger.info('config', `db=${dbPath}${dryRun ? ' (dry run)' : ''}`);

        const lookups = loadLookups(baseDir, config.lookups);
        const inputs: PipelineInputs = {
          metadata: readDataset('metadata', config.inputs.metadata),
          genres: readDataset('genres', config.inputs.genres),
          financial: readDataset('financial', config.inputs.financial),
        };

        if (!dryRun) db = new MovieDb(dbPath);
        const { report } = runPipeline(inputs, { lookups, quality, sink: db, logger, dryRun });
        db?.recordRun({ startedAt, dryRun, report });

        for (const line of renderRunSummary(report)) console.log(line);
        logger.writeStatus({ startedAt, finishedAt: new Date().toISOString(), ok: true, report });
      } catch (err) {
        const message = (err as Error).message;
        console.error(red(`Run failed: ${message}`));
        logger?.writeStatus({ startedAt, finishedAt: new Date().toISOString(), ok: false, error: message });
        process.exitCode = 1;
      } finally {
        if (logger) console.log(`Run log: ${logger.writeLog()}`);
        db?.close();
      }
    });
}
