/**
 * Draw Deduplication
 *
 * A draw is identified by (date, time, number). Overlapping fetch windows
 * and corrective re-publication both produce repeats; the source is treated
 * as append-only, so the last observation of a key replaces earlier ones
 * while the key keeps the position of its first appearance.
 */

import type { CanonicalRecord } from './types.js'

export function drawKey(record: Pick<CanonicalRecord, 'date' | 'time' | 'number'>): string {
  return `${record.date}|${record.time}|${record.number}`
}

export function dedupeRecords(records: readonly CanonicalRecord[]): CanonicalRecord[] {
  // Map keeps insertion order; set() on an existing key keeps its slot
  const byKey = new Map<string, CanonicalRecord>()
  for (const record of records) {
    byKey.set(drawKey(record), record)
  }
  return [...byKey.values()]
}
