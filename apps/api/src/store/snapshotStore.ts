import { StoreFailure } from '../errors.js';
import type { ListingRecord, SnapshotSummary, TimeRange } from '../types.js';

/**
 * Append-only persistence for listing snapshots, partitioned by complex.
 * Rows are never updated or deleted after a successful append.
 */
export interface SnapshotStore {
  /** Writes every record or none of them. */
  append(records: readonly ListingRecord[]): Promise<void>;
  /** Ordered by collectedAt, then listingId. Bounds are inclusive. */
  query(complexId: string, range?: TimeRange): Promise<ListingRecord[]>;
  listSnapshots(complexId: string, range?: TimeRange): Promise<SnapshotSummary[]>;
  listingHistory(complexId: string, listingId: string): Promise<ListingRecord[]>;
}

export function naturalKey(record: Pick<ListingRecord, 'complexId' | 'listingId' | 'collectedAt'>): string {
  return `${record.complexId}|${record.collectedAt.getTime()}|${record.listingId}`;
}

export function isEmptyRange(range: TimeRange | undefined): boolean {
  return !!range?.from && !!range.to && range.from.getTime() > range.to.getTime();
}

export function inRange(at: Date, range: TimeRange | undefined): boolean {
  const ms = at.getTime();
  if (range?.from && ms < range.from.getTime()) return false;
  if (range?.to && ms > range.to.getTime()) return false;
  return true;
}

export function compareRecords(a: ListingRecord, b: ListingRecord): number {
  const byTime = a.collectedAt.getTime() - b.collectedAt.getTime();
  if (byTime !== 0) return byTime;
  if (a.listingId < b.listingId) return -1;
  if (a.listingId > b.listingId) return 1;
  return 0;
}

/**
 * Checks a batch before anything is written: one complex, one collectedAt,
 * valid timestamps and no repeated natural key. Returns the batch's complex
 * and collectedAt, or null for an empty batch.
 */
export function validateBatch(
  records: readonly ListingRecord[]
): { complexId: string; collectedAt: Date } | null {
  const first = records[0];
  if (!first) return null;

  const keys = new Set<string>();
  for (const [index, record] of records.entries()) {
    if (!record.listingId || !record.complexId) {
      throw new StoreFailure('INVALID_BATCH', `record ${index} is missing listingId or complexId`);
    }
    if (Number.isNaN(record.collectedAt.getTime())) {
      throw new StoreFailure('INVALID_BATCH', `record ${index} (${record.listingId}) has an invalid collectedAt`);
    }
    if (record.complexId !== first.complexId || record.collectedAt.getTime() !== first.collectedAt.getTime()) {
      throw new StoreFailure('INVALID_BATCH', 'a batch must belong to a single complex and collectedAt');
    }
    const key = naturalKey(record);
    if (keys.has(key)) {
      throw new StoreFailure('DUPLICATE_KEY', `listing ${record.listingId} appears twice in the batch`);
    }
    keys.add(key);
  }

  return { complexId: first.complexId, collectedAt: first.collectedAt };
}

/** Runs tasks one at a time, in call order. */
export class SerialLock {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    this.tail = next.catch(() => undefined);
    return next;
  }
}
