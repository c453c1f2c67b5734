import { randomUUID } from 'node:crypto';
import admin from 'firebase-admin';
import { z } from 'zod';
import { StoreFailure, errorMessage } from '../errors.js';
import { getFirestore } from '../firebase.js';
import type { ListingRecord, SnapshotSummary, TimeRange } from '../types.js';
import { SerialLock, compareRecords, isEmptyRange, validateBatch, type SnapshotStore } from './snapshotStore.js';

// gRPC status returned by `create` when the document is already there.
const ALREADY_EXISTS = 6;

const timestamp = z.instanceof(admin.firestore.Timestamp);
const nullableText = z.string().nullable();
const nullableNumber = z.number().nullable();

const listingDocSchema = z.object({
  listingId: z.string().min(1),
  complexId: z.string().min(1),
  listingTypeName: nullableText,
  tradeTypeName: nullableText,
  priceRaw: nullableText,
  priceNormalized: nullableNumber,
  areaPrimary: nullableText,
  areaSecondary: nullableText,
  floorInfo: nullableText,
  direction: nullableText,
  latitude: nullableNumber,
  longitude: nullableNumber,
  tradePrice: nullableText,
  realtorName: nullableText,
  buildingName: nullableText,
  collectedAt: timestamp,
  description: nullableText,
  confirmedDate: nullableText
});

const snapshotDocSchema = z.object({
  complexId: z.string(),
  collectedAt: timestamp,
  count: z.number().int()
});

function hasGrpcCode(err: unknown, code: number): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

function listingDocId(record: ListingRecord): string {
  return `${record.collectedAt.getTime()}_${encodeURIComponent(record.listingId)}`;
}

/**
 * Listings live under `complexes/{complexId}/listings`, one document per
 * observation. Every append also writes a summary document under
 * `complexes/{complexId}/snapshots` in the same batch.
 */
export class FirestoreSnapshotStore implements SnapshotStore {
  private readonly lock = new SerialLock();

  private listings(complexId: string) {
    return getFirestore().collection(`complexes/${encodeURIComponent(complexId)}/listings`);
  }

  private snapshots(complexId: string) {
    return getFirestore().collection(`complexes/${encodeURIComponent(complexId)}/snapshots`);
  }

  private withRange(query: admin.firestore.Query, range: TimeRange | undefined): admin.firestore.Query {
    let q = query;
    if (range?.from) q = q.where('collectedAt', '>=', admin.firestore.Timestamp.fromDate(range.from));
    if (range?.to) q = q.where('collectedAt', '<=', admin.firestore.Timestamp.fromDate(range.to));
    return q;
  }

  private toRecords(snap: admin.firestore.QuerySnapshot): ListingRecord[] {
    return snap.docs.map((doc) => {
      const parsed = listingDocSchema.safeParse(doc.data());
      if (!parsed.success) {
        throw new StoreFailure('READ_FAILED', `listing document ${doc.id} does not match the listing schema`, {
          cause: parsed.error
        });
      }
      return { ...parsed.data, collectedAt: parsed.data.collectedAt.toDate() };
    });
  }

  private async read<T>(what: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (err) {
      if (err instanceof StoreFailure) throw err;
      throw new StoreFailure('READ_FAILED', `${what} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async append(records: readonly ListingRecord[]): Promise<void> {
    const batchInfo = validateBatch(records);
    if (!batchInfo) return;

    await this.lock.run(async () => {
      const db = getFirestore();
      const collectedAt = admin.firestore.Timestamp.fromDate(batchInfo.collectedAt);
      const createdAt = admin.firestore.FieldValue.serverTimestamp();
      const batch = db.batch();

      const listingsCol = this.listings(batchInfo.complexId);
      for (const record of records) {
        batch.create(listingsCol.doc(listingDocId(record)), { ...record, collectedAt, createdAt });
      }

      batch.create(this.snapshots(batchInfo.complexId).doc(`${batchInfo.collectedAt.getTime()}_${randomUUID()}`), {
        complexId: batchInfo.complexId,
        collectedAt,
        count: records.length,
        createdAt
      });

      try {
        await batch.commit();
      } catch (err) {
        if (hasGrpcCode(err, ALREADY_EXISTS)) {
          throw new StoreFailure('DUPLICATE_KEY', `batch overlaps stored listings: ${errorMessage(err)}`, {
            cause: err
          });
        }
        throw new StoreFailure('WRITE_FAILED', `batch commit failed: ${errorMessage(err)}`, { cause: err });
      }
    });
  }

  async query(complexId: string, range?: TimeRange): Promise<ListingRecord[]> {
    if (isEmptyRange(range)) return [];
    return this.read('listing query', async () => {
      const snap = await this.withRange(this.listings(complexId), range)
        .orderBy('collectedAt', 'asc')
        .orderBy('listingId', 'asc')
        .get();
      return this.toRecords(snap);
    });
  }

  async listSnapshots(complexId: string, range?: TimeRange): Promise<SnapshotSummary[]> {
    if (isEmptyRange(range)) return [];
    return this.read('snapshot query', async () => {
      const snap = await this.withRange(this.snapshots(complexId), range).orderBy('collectedAt', 'asc').get();

      // Several appends may share one collectedAt; fold them into one summary.
      const counts = new Map<number, number>();
      for (const doc of snap.docs) {
        const parsed = snapshotDocSchema.safeParse(doc.data());
        if (!parsed.success) {
          throw new StoreFailure('READ_FAILED', `snapshot document ${doc.id} does not match the snapshot schema`, {
            cause: parsed.error
          });
        }
        const ms = parsed.data.collectedAt.toMillis();
        counts.set(ms, (counts.get(ms) ?? 0) + parsed.data.count);
      }

      return [...counts.entries()]
        .sort(([a], [b]) => a - b)
        .map(([ms, count]) => ({ complexId, collectedAt: new Date(ms), count }));
    });
  }

  async listingHistory(complexId: string, listingId: string): Promise<ListingRecord[]> {
    return this.read('listing history query', async () => {
      const snap = await this.listings(complexId)
        .where('listingId', '==', listingId)
        .orderBy('collectedAt', 'asc')
        .get();
      return this.toRecords(snap).sort(compareRecords);
    });
  }
}
