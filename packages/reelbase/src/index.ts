#!/usr/bin/env node
/**
 * reelbase - movie dataset normalization and entity resolution
 *
 * Reads: metadata, genre/certificate and box-office catalogs (CSV)
 * Writes: movies, genres, movie_genres (SQLite)
 */

import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { makeReportCommand } from './cli/report.js';
import { makeRunCommand } from './cli/run.js';

const baseDir = fileURLToPath(new URL('..', import.meta.url));

const program = new Command();

program
  .name('reelbase')
  .description('Build a relational movie dataset from three raw catalogs')
  .version('0.1.0');

program.addCommand(makeRunCommand(baseDir));
program.addCommand(makeReportCommand(baseDir));

program.parse(process.argv);
