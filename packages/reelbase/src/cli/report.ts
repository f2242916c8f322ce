/**
 * reelbase report
 * Print table statistics and the last run from the SQLite DB.
 */

import fs from 'node:fs';

import { Command } from 'commander';
import { red } from 'colorette';

import { MovieDb } from '../db/client.js';
import { printStatus } from '../report/report.js';
import { loadConfig } from '../shared/config.js';

interface ReportOptions {
  config?: string;
  db?: string;
  limit: string;
}

export function makeReportCommand(baseDir: string): Command {
  return new Command('report')
    .description('Print movie/genre counts, coverage and distributions from the DB')
    .option('-c, --config <path>', 'Config file')
    .option('-d, --db <path>', 'SQLite DB path (overrides storage.dbPath)')
    .option('--limit <n>', 'Number of top genres to show', '10')
    .action((opts: ReportOptions) => {
      try {
        const dbPath = opts.db ?? loadConfig(baseDir, opts.config).storage.dbPath;
        if (!fs.existsSync(dbPath)) {
          throw new Error(`DB not found: ${dbPath} (run "reelbase run" first)`);
        }
        const limit = parseInt(opts.limit, 10);
        if (!Number.isInteger(limit) || limit <= 0) {
          throw new Error(`--limit must be a positive integer, got "${opts.limit}"`);
        }

        const db = new MovieDb(dbPath);
        try {
          printStatus(db, limit);
        } finally {
          db.close();
        }
      } catch (err) {
        console.error(red((err as Error).message));
        process.exitCode = 1;
      }
    });
}
