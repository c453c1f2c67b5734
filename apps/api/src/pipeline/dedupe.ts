import type { ListingRecord } from '../types.js';

export interface DedupeResult {
  records: ListingRecord[];
  duplicates: number;
}

/**
 * Collapses repeated listingIds within one run, keeping the first occurrence.
 * Page overlap on the upstream side is the usual source of repeats, and its
 * ordering is stable within a run, so first-seen is deterministic.
 */
export function dedupeListings(records: readonly ListingRecord[]): DedupeResult {
  const seen = new Set<string>();
  const kept: ListingRecord[] = [];

  for (const record of records) {
    if (seen.has(record.listingId)) continue;
    seen.add(record.listingId);
    kept.push(record);
  }

  return { records: kept, duplicates: records.length - kept.length };
}
