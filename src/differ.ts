import type { ListingRecord, SeenEntry, SeenSet } from "./types.js";

export interface DiffResult {
  /** Listings not in the seen set, in discovery order (page order, then in-page order). */
  newRecords: ListingRecord[];
  /** seenSet ∪ ids of newRecords. The input set is left untouched. */
  updatedSeenSet: SeenSet;
}

export function diff(filtered: readonly ListingRecord[], seenSet: SeenSet, now: Date = new Date()): DiffResult {
  const updated = new Map<string, SeenEntry>(seenSet);
  const newRecords: ListingRecord[] = [];
  const firstSeenAt = now.toISOString();
  for (const record of filtered) {
    // also drops a listing repeated on a later page
    if (updated.has(record.id)) continue;
    updated.set(record.id, { firstSeenAt });
    newRecords.push(record);
  }
  return { newRecords, updatedSeenSet: updated };
}
