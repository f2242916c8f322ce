/**
 * Fatal pipeline errors.
 * Record-level problems are never thrown; they travel as RejectReason values.
 */

import type { DatasetKind } from './types.js';

/** A raw dataset lacks a column group that normalization cannot do without. */
export class PipelineStructureError extends Error {
  readonly dataset: DatasetKind;
  readonly missing: string[][];

  constructor(dataset: DatasetKind, missing: string[][]) {
    const groups = missing.map(g => g.join(' | ')).join(', ');
    super(`Dataset "${dataset}" is missing required column(s): ${groups}`);
    this.name = 'PipelineStructureError';
    this.dataset = dataset;
    this.missing = missing;
  }
}

/** The assembled output tables break a key or reference invariant. */
export class TableIntegrityError extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Output tables failed integrity check: ${violations.slice(0, 5).join('; ')}` +
      (violations.length > 5 ? ` (+${violations.length - 5} more)` : ''));
    this.name = 'TableIntegrityError';
    this.violations = violations;
  }
}
