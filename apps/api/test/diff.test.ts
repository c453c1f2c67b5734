import os from 'node:os';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { diffLatest, diffSnapshots, type DiffDeps } from '../src/analysis/diff.js';
import { DiffFailure } from '../src/errors.js';
import { FileSnapshotStore } from '../src/store/fileSnapshotStore.js';
import { makeListing } from './support/listings.js';

const COMPLEX = '108064';
const D1 = new Date('2025-03-01T09:00:00.000Z');
const D2 = new Date('2025-03-02T09:00:00.000Z');
const D3 = new Date('2025-03-03T09:00:00.000Z');

let dataDir: string;
let deps: DiffDeps;

async function snapshot(at: Date, prices: Record<string, number | null>) {
  await deps.store.append(
    Object.entries(prices).map(([listingId, priceNormalized]) => makeListing({ listingId, collectedAt: at, priceNormalized }))
  );
}

beforeEach(async () => {
  dataDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'listing-watch-diff-'));
  deps = { store: new FileSnapshotStore(dataDir), trackedComplexIds: [COMPLEX, '3833'] };
});

afterEach(async () => {
  await fsp.rm(dataDir, { recursive: true, force: true });
});

describe('diffSnapshots', () => {
  it('reports a disappeared listing and a price change', async () => {
    await snapshot(D1, { A: 500_000_000, B: 300_000_000 });
    await snapshot(D2, { A: 520_000_000 });

    const diff = await diffSnapshots(deps, COMPLEX, D1, D2);

    expect(diff.disappeared).toEqual(['B']);
    expect(diff.appeared).toEqual([]);
    expect(diff.priceChanged).toEqual([{ listingId: 'A', from: 500_000_000, to: 520_000_000, delta: 20_000_000 }]);
    expect(diff.fromSnapshotAt).toEqual(D1);
    expect(diff.toSnapshotAt).toEqual(D2);
  });

  it('finds nothing between identical snapshots', async () => {
    await snapshot(D1, { A: 1, B: 2 });
    await snapshot(D2, { A: 1, B: 2 });

    const diff = await diffSnapshots(deps, COMPLEX, D1, D2);

    expect(diff.disappeared).toEqual([]);
    expect(diff.appeared).toEqual([]);
    expect(diff.priceChanged).toEqual([]);
  });

  it('reports newly listed ids as appeared', async () => {
    await snapshot(D1, { A: 1 });
    await snapshot(D2, { A: 1, C: 5, B: 4 });

    const diff = await diffSnapshots(deps, COMPLEX, D1, D2);

    expect(diff.appeared).toEqual(['B', 'C']);
    expect(diff.disappeared).toEqual([]);
  });

  it('returns an empty diff when nothing was collected before from', async () => {
    await snapshot(D2, { A: 1 });

    const diff = await diffSnapshots(deps, COMPLEX, D1, D3);

    expect(diff.fromSnapshotAt).toBeNull();
    expect(diff.toSnapshotAt).toEqual(D2);
    expect(diff.disappeared).toEqual([]);
    expect(diff.appeared).toEqual([]);
    expect(diff.priceChanged).toEqual([]);
  });

  it('returns an empty diff for a complex with no history at all', async () => {
    const diff = await diffSnapshots(deps, '3833', D1, D2);

    expect(diff).toEqual({
      complexId: '3833',
      from: D1,
      to: D2,
      fromSnapshotAt: null,
      toSnapshotAt: null,
      disappeared: [],
      appeared: [],
      priceChanged: []
    });
  });

  it('uses the nearest snapshot at or before each timestamp', async () => {
    await snapshot(D1, { A: 1, B: 2 });
    await snapshot(D2, { A: 1 });
    await snapshot(D3, { A: 1, B: 2, C: 3 });

    const hour = 60 * 60 * 1000;
    const diff = await diffSnapshots(deps, COMPLEX, new Date(D1.getTime() + hour), new Date(D3.getTime() - hour));

    expect(diff.fromSnapshotAt).toEqual(D1);
    expect(diff.toSnapshotAt).toEqual(D2);
    expect(diff.disappeared).toEqual(['B']);
    expect(diff.appeared).toEqual([]);
  });

  it('is empty when both timestamps resolve to the same snapshot', async () => {
    await snapshot(D1, { A: 1 });

    const diff = await diffSnapshots(deps, COMPLEX, D1, D2);

    expect(diff.fromSnapshotAt).toEqual(D1);
    expect(diff.toSnapshotAt).toEqual(D1);
    expect(diff.disappeared).toEqual([]);
  });

  it('ignores listings whose price is missing on either side', async () => {
    await snapshot(D1, { A: null, B: 100, C: 100 });
    await snapshot(D2, { A: 200, B: null, C: 100 });

    const diff = await diffSnapshots(deps, COMPLEX, D1, D2);

    expect(diff.priceChanged).toEqual([]);
  });

  it('rejects an untracked complex', async () => {
    await expect(diffSnapshots(deps, '000000', D1, D2)).rejects.toBeInstanceOf(DiffFailure);
    await expect(diffSnapshots(deps, '000000', D1, D2)).rejects.toMatchObject({ code: 'UNKNOWN_COMPLEX' });
  });

  it('rejects from after to and invalid timestamps', async () => {
    await expect(diffSnapshots(deps, COMPLEX, D2, D1)).rejects.toMatchObject({ code: 'INVALID_RANGE' });
    await expect(diffSnapshots(deps, COMPLEX, new Date('nope'), D1)).rejects.toMatchObject({ code: 'INVALID_RANGE' });
  });
});

describe('diffLatest', () => {
  it('returns null with fewer than two snapshots', async () => {
    expect(await diffLatest(deps, COMPLEX)).toBeNull();
    await snapshot(D1, { A: 1 });
    expect(await diffLatest(deps, COMPLEX)).toBeNull();
  });

  it('compares the two most recent snapshots', async () => {
    await snapshot(D1, { A: 1, B: 1 });
    await snapshot(D2, { A: 1, B: 1, C: 1 });
    await snapshot(D3, { A: 2, C: 1 });

    const diff = await diffLatest(deps, COMPLEX);

    expect(diff?.fromSnapshotAt).toEqual(D2);
    expect(diff?.toSnapshotAt).toEqual(D3);
    expect(diff?.disappeared).toEqual(['B']);
    expect(diff?.priceChanged).toEqual([{ listingId: 'A', from: 1, to: 2, delta: 1 }]);
  });
});
