/**
 * Deduplicator: per-dataset duplicate collapse, first-seen wins.
 * Phase 1 keys on the source-native id, phase 2 on the fallback key, so two
 * rows under different ids for the same film still collapse.
 */

import { fallbackKey } from '../normalize/title.js';
import type { Admitted, NormalizedRecordBase } from '../shared/types.js';

export interface DedupResult<R> {
  kept: R[];
  droppedById: R[];
  droppedByKey: R[];
}

export function recordKey(record: Admitted<NormalizedRecordBase>): string {
  return fallbackKey(record.normalizedTitle, record.year);
}

export function deduplicate<R extends Admitted<NormalizedRecordBase>>(records: readonly R[]): DedupResult<R> {
  const result: DedupResult<R> = { kept: [], droppedById: [], droppedByKey: [] };

  const seenIds = new Set<string>();
  const byId: R[] = [];
  for (const record of records) {
    if (record.rawId != null) {
      if (seenIds.has(record.rawId)) {
        result.droppedById.push(record);
        continue;
      }
      seenIds.add(record.rawId);
    }
    byId.push(record);
  }

  const seenKeys = new Set<string>();
  for (const record of byId) {
    const key = recordKey(record);
    if (seenKeys.has(key)) {
      result.droppedByKey.push(record);
      continue;
    }
    seenKeys.add(key);
    result.kept.push(record);
  }

  return result;
}
