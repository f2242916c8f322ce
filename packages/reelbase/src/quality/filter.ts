/**
 * QualityFilter: row-level admission control.
 *
 * Every rule is an independent predicate; a record is admitted only when none
 * is violated. Rule order decides which reason gets reported:
 *   CRITICAL_NULL → YEAR_OUT_OF_RANGE → dataset rules → NON_CRITICAL_THRESHOLD_EXCEEDED
 */

import { isYearInRange } from '../normalize/year.js';
import { isBlank, isMissing } from '../normalize/values.js';
import type { Admitted, NormalizedRecordBase, RejectReason, Rejection } from '../shared/types.js';
import type { DatasetPolicy, QualityContext } from './policies.js';

export type Verdict<R> =
  | { record: R; pass: true }
  | { record: R; pass: false; reason: RejectReason; detail: string };

export interface QualityResult<R extends NormalizedRecordBase> {
  admitted: Admitted<R>[];
  verdicts: Verdict<R>[];
}

interface Violation {
  reason: RejectReason;
  detail: string;
}

function hasIdentity<R extends NormalizedRecordBase>(record: R): record is Admitted<R> {
  return record.title != null && record.normalizedTitle != null && record.year != null;
}

/** Fraction of non-critical columns of `record` that hold no value. */
export function missingFraction<R extends NormalizedRecordBase>(record: R, policy: DatasetPolicy<R>): number {
  const values = new Map<string, unknown>(Object.entries(record));
  const columns = Object.entries(policy.columns)
    .filter(([, cls]) => cls === 'non-critical')
    .map(([field]) => field);
  if (columns.length === 0) return 0;
  const missing = columns.filter(field => isMissing(values.get(field))).length;
  return missing / columns.length;
}

/** First violated rule, or null when the record is admissible. */
export function evaluate<R extends NormalizedRecordBase>(
  record: R,
  policy: DatasetPolicy<R>,
  ctx: QualityContext
): Violation | null {
  const values = new Map<string, unknown>(Object.entries(record));

  const nullCritical = Object.entries(policy.columns)
    .filter(([field, cls]) => cls === 'critical' && isBlank(values.get(field)))
    .map(([field]) => field);
  if (nullCritical.length > 0) {
    return { reason: 'CRITICAL_NULL', detail: `missing ${nullCritical.join(', ')}` };
  }

  if (record.year == null || !isYearInRange(record.year, ctx)) {
    return {
      reason: 'YEAR_OUT_OF_RANGE',
      detail: `year ${record.year ?? 'missing'} outside ${ctx.minYear}-${ctx.maxYear}`,
    };
  }

  for (const rule of policy.rules) {
    const detail = rule.violated(record, ctx);
    if (detail != null) return { reason: rule.reason, detail };
  }

  const fraction = missingFraction(record, policy);
  if (fraction > ctx.nonCriticalNullThreshold) {
    return {
      reason: 'NON_CRITICAL_THRESHOLD_EXCEEDED',
      detail: `${Math.round(fraction * 100)}% of non-critical columns missing`,
    };
  }

  return null;
}

export function applyQualityFilter<R extends NormalizedRecordBase>(
  records: readonly R[],
  policy: DatasetPolicy<R>,
  ctx: QualityContext
): QualityResult<R> {
  const result: QualityResult<R> = { admitted: [], verdicts: [] };

  for (const record of records) {
    const violation = evaluate(record, policy, ctx);
    if (violation) {
      result.verdicts.push({ record, pass: false, ...violation });
    } else if (hasIdentity(record)) {
      result.verdicts.push({ record, pass: true });
      result.admitted.push(record);
    }
  }

  return result;
}

/** Rejected verdicts as log-ready rejections. */
export function rejectionsOf<R extends NormalizedRecordBase>(verdicts: readonly Verdict<R>[]): Rejection[] {
  const out: Rejection[] = [];
  for (const v of verdicts) {
    if (!v.pass) {
      out.push({ dataset: v.record.dataset, rowIndex: v.record.rowIndex, reason: v.reason, detail: v.detail });
    }
  }
  return out;
}
