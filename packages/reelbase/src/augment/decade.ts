import type { Admitted, Clean, NormalizedRecordBase } from '../shared/types.js';

export function decadeOf(year: number): number {
  return year - (year % 10);
}

/** Copies of `records` with the decade bucket filled in. */
export function addDecade<R extends NormalizedRecordBase>(records: readonly Admitted<R>[]): Clean<R>[] {
  return records.map(record => ({ ...record, decade: decadeOf(record.year) }));
}
