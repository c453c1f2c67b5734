import { FetchFailure, errorMessage } from '../errors.js';
import type { SnapshotStore } from '../store/index.js';
import type { CollectionResult, FetchListings, ListingRecord, TradeType } from '../types.js';
import { dedupeListings } from './dedupe.js';
import { normalizeListing } from './normalize.js';

export interface CollectDeps {
  fetchListings: FetchListings;
  store: SnapshotStore;
  now?: () => Date;
}

export interface CollectParams {
  complexId: string;
  tradeType: TradeType;
}

/**
 * One collection run for one complex: fetch, normalize, dedupe, append.
 * A fetch failure aborts the run before anything is written. There is no
 * retry here; callers re-run the whole collection.
 */
export async function runCollection(params: CollectParams, deps: CollectDeps): Promise<CollectionResult> {
  const { complexId, tradeType } = params;
  const collectedAt = (deps.now ?? (() => new Date()))();

  let raw: unknown[];
  try {
    raw = await deps.fetchListings(complexId, tradeType);
  } catch (err) {
    if (err instanceof FetchFailure) throw err;
    throw new FetchFailure(`fetch for complex ${complexId} failed: ${errorMessage(err)}`, { cause: err });
  }

  const normalized: ListingRecord[] = [];
  let failed = 0;
  for (const item of raw) {
    const result = normalizeListing(item, { complexId, collectedAt });
    if (result.ok) {
      normalized.push(result.record);
    } else {
      failed++;
      console.warn('[collect] dropped unusable listing', { complexId, tradeType, reason: result.reason });
    }
  }

  const { records, duplicates } = dedupeListings(normalized);
  await deps.store.append(records);

  const result: CollectionResult = {
    complexId,
    tradeType,
    collectedAt,
    fetched: raw.length,
    stored: records.length,
    failed,
    duplicates
  };

  console.log('[collect] run complete', { ...result, collectedAt: collectedAt.toISOString() });
  return result;
}
