import fs from 'node:fs';
import path from 'node:path';

import { cyan, dim, red, yellow } from 'colorette';

import type { DiagnosticCode } from './types.js';

export type LogLevel = 'info' | 'warn' | 'error';

export interface RunLogEntry {
  at: string;
  level: LogLevel;
  stage: string;
  code?: DiagnosticCode;
  message: string;
  data?: Record<string, unknown>;
}

export interface RunLoggerOptions {
  /** Directory for run logs; nothing is written to disk when omitted. */
  logDir?: string;
  /** Mirror entries to the console. Default: true. */
  echo?: boolean;
}

const LEVEL_TAG: Record<LogLevel, (s: string) => string> = {
  info: cyan,
  warn: yellow,
  error: red,
};

/**
 * Collects the structured entries of one pipeline run and persists them as
 * `<logDir>/<timestamp>.json` plus `<logDir>/status/last-run.json`.
 */
export class RunLogger {
  private readonly entries: RunLogEntry[] = [];
  private readonly logDir?: string;
  private readonly echo: boolean;
  private logPath?: string;

  constructor(opts: RunLoggerOptions = {}) {
    this.logDir = opts.logDir;
    this.echo = opts.echo ?? true;
  }

  info(stage: string, message: string, data?: Record<string, unknown>): void {
    this.push({ level: 'info', stage, message, data });
  }

  warn(stage: string, message: string, data?: Record<string, unknown>): void {
    this.push({ level: 'warn', stage, message, data });
  }

  error(stage: string, message: string, data?: Record<string, unknown>): void {
    this.push({ level: 'error', stage, message, data });
  }

  /** Record a coded diagnostic (rejection, collision, coverage gap). */
  event(level: LogLevel, stage: string, code: DiagnosticCode, message: string, data?: Record<string, unknown>): void {
    this.push({ level, stage, code, message, data });
  }

  getEntries(): readonly RunLogEntry[] {
    return this.entries;
  }

  count(code: DiagnosticCode): number {
    return this.entries.filter(e => e.code === code).length;
  }

  private push(entry: Omit<RunLogEntry, 'at'>): void {
    const full: RunLogEntry = { at: new Date().toISOString(), ...entry };
    this.entries.push(full);
    // Per-record diagnostics stay in the file; the console gets stage messages
    if (this.echo && (!entry.code || entry.level !== 'info')) {
      const tag = LEVEL_TAG[entry.level](entry.level.toUpperCase().padEnd(5));
      console.log(`${tag} ${dim(`[${entry.stage}]`)} ${entry.message}`);
    }
  }

  private ensureDirs(): string {
    if (!this.logDir) throw new Error('RunLogger has no logDir configured');
    fs.mkdirSync(path.join(this.logDir, 'status'), { recursive: true });
    return this.logDir;
  }

  /** Write all entries atomically (tmp file + rename). Returns the log path. */
  writeLog(): string {
    const dir = this.ensureDirs();
    if (!this.logPath) {
      const ts = new Date().toISOString().replace(/[:.]/g, '-');
      this.logPath = path.join(dir, `${ts}.json`);
    }
    const tmpPath = `${this.logPath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(this.entries, null, 2));
    fs.renameSync(tmpPath, this.logPath);
    return this.logPath;
  }

  writeStatus(summary: object): string {
    const dir = this.ensureDirs();
    const filePath = path.join(dir, 'status', 'last-run.json');
    fs.writeFileSync(filePath, JSON.stringify(summary, null, 2));
    return filePath;
  }
}
