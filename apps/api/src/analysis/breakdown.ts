import type { SnapshotStore } from '../store/index.js';
import type { ListingRecord, TimeRange } from '../types.js';
import { compareSnapshots } from './diff.js';

export type BreakdownField = 'realtorName' | 'buildingName';

export interface LatestSummary {
  complexId: string;
  collectedAt: Date | null;
  count: number;
  /** Mean of the priced listings, rounded to the won; null when none has a price. */
  averagePrice: number | null;
  /** Listings in the latest snapshot that the one before it did not have. */
  newSincePrevious: number;
}

export interface TrendPoint {
  collectedAt: Date;
  count: number;
}

export interface BreakdownGroup {
  name: string | null;
  latestCount: number;
  trend: TrendPoint[];
}

export interface Breakdown {
  complexId: string;
  by: BreakdownField;
  latestSnapshotAt: Date | null;
  groups: BreakdownGroup[];
}

function at(collectedAt: Date): TimeRange {
  return { from: collectedAt, to: collectedAt };
}

export function averagePrice(records: readonly ListingRecord[]): number | null {
  let total = 0;
  let priced = 0;
  for (const record of records) {
    if (record.priceNormalized === null) continue;
    total += record.priceNormalized;
    priced++;
  }
  return priced === 0 ? null : Math.round(total / priced);
}

export async function summarizeLatest(store: SnapshotStore, complexId: string): Promise<LatestSummary> {
  const snapshots = await store.listSnapshots(complexId);
  const latest = snapshots[snapshots.length - 1];
  if (!latest) {
    return { complexId, collectedAt: null, count: 0, averagePrice: null, newSincePrevious: 0 };
  }

  const records = await store.query(complexId, at(latest.collectedAt));
  const previous = snapshots[snapshots.length - 2];
  const newSincePrevious = previous
    ? compareSnapshots(await store.query(complexId, at(previous.collectedAt)), records).appeared.length
    : 0;

  return {
    complexId,
    collectedAt: latest.collectedAt,
    count: records.length,
    averagePrice: averagePrice(records),
    newSincePrevious
  };
}

function byLatestCount(a: BreakdownGroup, b: BreakdownGroup): number {
  if (a.latestCount !== b.latestCount) return b.latestCount - a.latestCount;
  if (a.name === b.name) return 0;
  if (a.name === null) return 1;
  if (b.name === null) return -1;
  return a.name < b.name ? -1 : 1;
}

/**
 * Listing counts per realtor or building for every snapshot in range. Each
 * group's trend has one point per snapshot, zero where the group had nothing,
 * so a withdrawn batch of listings shows as a drop rather than a gap.
 */
export async function breakdown(
  store: SnapshotStore,
  complexId: string,
  by: BreakdownField,
  range?: TimeRange
): Promise<Breakdown> {
  const records = await store.query(complexId, range);

  const times: number[] = [];
  const counts = new Map<string | null, Map<number, number>>();
  for (const record of records) {
    const ms = record.collectedAt.getTime();
    if (times[times.length - 1] !== ms) times.push(ms);

    const name = record[by];
    const perSnapshot = counts.get(name) ?? new Map<number, number>();
    perSnapshot.set(ms, (perSnapshot.get(ms) ?? 0) + 1);
    counts.set(name, perSnapshot);
  }

  const latestMs = times[times.length - 1];
  const groups = [...counts.entries()].map(([name, perSnapshot]) => ({
    name,
    latestCount: latestMs === undefined ? 0 : perSnapshot.get(latestMs) ?? 0,
    trend: times.map((ms) => ({ collectedAt: new Date(ms), count: perSnapshot.get(ms) ?? 0 }))
  }));

  return {
    complexId,
    by,
    latestSnapshotAt: latestMs === undefined ? null : new Date(latestMs),
    groups: groups.sort(byLatestCount)
  };
}
