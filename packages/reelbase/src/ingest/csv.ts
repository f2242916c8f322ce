/**
 * Raw dataset reader.
 * A dataset path is either one CSV file or a folder whose *.csv files are
 * stacked in file-name order (the per-genre / per-year exports).
 */

import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'csv-parse/sync';

import type { DatasetKind, RawRecord, RawTable } from '../shared/types.js';

function isRecord(value: unknown): value is RawRecord {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/** Parse CSV text into a header and its rows. */
export function parseCsv(text: string, source = 'input'): { columns: string[]; rows: RawRecord[] } {
  let header: string[] = [];
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      columns: (names: string[]) => {
        header = names.map(n => n.trim());
        return header;
      },
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (err) {
    throw new Error(`Cannot parse ${source}: ${(err as Error).message}`);
  }

  if (!Array.isArray(parsed)) throw new Error(`Cannot parse ${source}: unexpected parser output`);
  return { columns: header, rows: parsed.filter(isRecord) };
}

export function listCsvFiles(dir: string): string[] {
  return fs
    .readdirSync(dir)
    .filter(name => name.toLowerCase().endsWith('.csv'))
    .sort()
    .map(name => path.join(dir, name));
}

export function readDataset(dataset: DatasetKind, inputPath: string): RawTable {
  if (!fs.existsSync(inputPath)) {
    throw new Error(`Input for dataset "${dataset}" not found: ${inputPath}`);
  }

  const files = fs.statSync(inputPath).isDirectory() ? listCsvFiles(inputPath) : [inputPath];
  if (files.length === 0) {
    throw new Error(`No CSV files for dataset "${dataset}" in ${inputPath}`);
  }

  const columns: string[] = [];
  const rows: RawRecord[] = [];
  for (const file of files) {
    const table = parseCsv(fs.readFileSync(file, 'utf-8'), file);
    for (const col of table.columns) {
      if (!columns.includes(col)) columns.push(col);
    }
    rows.push(...table.rows);
  }

  return { dataset, columns, rows };
}
