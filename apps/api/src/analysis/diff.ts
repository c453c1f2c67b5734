import { DiffFailure } from '../errors.js';
import type { SnapshotStore } from '../store/index.js';
import type { ListingRecord, PriceChange, SnapshotDiff, SnapshotSummary } from '../types.js';

export interface DiffDeps {
  store: SnapshotStore;
  trackedComplexIds: readonly string[];
}

function assertTracked(deps: DiffDeps, complexId: string): void {
  if (!deps.trackedComplexIds.includes(complexId)) {
    throw new DiffFailure('UNKNOWN_COMPLEX', `complex ${complexId} is not tracked`);
  }
}

/** Latest snapshot taken at or before `at`; snapshots are ascending. */
function nearestPrior(snapshots: readonly SnapshotSummary[], at: Date): Date | null {
  let found: Date | null = null;
  for (const snapshot of snapshots) {
    if (snapshot.collectedAt.getTime() > at.getTime()) break;
    found = snapshot.collectedAt;
  }
  return found;
}

function byListingId(records: readonly ListingRecord[]): Map<string, ListingRecord> {
  return new Map(records.map((r) => [r.listingId, r]));
}

function sorted(ids: Iterable<string>): string[] {
  return [...ids].sort();
}

export function compareSnapshots(
  before: readonly ListingRecord[],
  after: readonly ListingRecord[]
): Pick<SnapshotDiff, 'disappeared' | 'appeared' | 'priceChanged'> {
  const earlier = byListingId(before);
  const later = byListingId(after);

  const disappeared = sorted([...earlier.keys()].filter((id) => !later.has(id)));
  const appeared = sorted([...later.keys()].filter((id) => !earlier.has(id)));

  const priceChanged: PriceChange[] = [];
  for (const id of sorted(earlier.keys())) {
    const from = earlier.get(id)?.priceNormalized ?? null;
    const to = later.get(id)?.priceNormalized ?? null;
    // A missing price on either side is a data-quality gap, not a change.
    if (from === null || to === null || from === to) continue;
    priceChanged.push({ listingId: id, from, to, delta: to - from });
  }

  return { disappeared, appeared, priceChanged };
}

/**
 * Compares the snapshot in effect at `from` with the one in effect at `to`.
 * A snapshot is in effect at a time when it is the latest one collected at or
 * before it, since runs are not evenly spaced. No snapshot before `from`
 * yields an empty diff.
 */
export async function diffSnapshots(deps: DiffDeps, complexId: string, from: Date, to: Date): Promise<SnapshotDiff> {
  assertTracked(deps, complexId);
  if (Number.isNaN(from.getTime()) || Number.isNaN(to.getTime())) {
    throw new DiffFailure('INVALID_RANGE', 'from and to must be valid timestamps');
  }
  if (from.getTime() > to.getTime()) {
    throw new DiffFailure('INVALID_RANGE', 'from must not be after to');
  }

  const snapshots = await deps.store.listSnapshots(complexId, { to });
  const fromSnapshotAt = nearestPrior(snapshots, from);
  const toSnapshotAt = nearestPrior(snapshots, to);

  const empty: SnapshotDiff = {
    complexId,
    from,
    to,
    fromSnapshotAt,
    toSnapshotAt,
    disappeared: [],
    appeared: [],
    priceChanged: []
  };

  if (!fromSnapshotAt || !toSnapshotAt || fromSnapshotAt.getTime() === toSnapshotAt.getTime()) {
    return empty;
  }

  const [before, after] = await Promise.all([
    deps.store.query(complexId, { from: fromSnapshotAt, to: fromSnapshotAt }),
    deps.store.query(complexId, { from: toSnapshotAt, to: toSnapshotAt })
  ]);

  return { ...empty, ...compareSnapshots(before, after) };
}

/** Diff between the two most recent snapshots, or null when there are fewer than two. */
export async function diffLatest(deps: DiffDeps, complexId: string): Promise<SnapshotDiff | null> {
  assertTracked(deps, complexId);

  const snapshots = await deps.store.listSnapshots(complexId);
  if (snapshots.length < 2) return null;

  const previous = snapshots[snapshots.length - 2].collectedAt;
  const latest = snapshots[snapshots.length - 1].collectedAt;
  return diffSnapshots(deps, complexId, previous, latest);
}
