import path from 'node:path';
import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { StoreFailure, errorMessage } from '../errors.js';
import type { ListingRecord, SnapshotSummary, TimeRange } from '../types.js';
import {
  SerialLock,
  compareRecords,
  inRange,
  isEmptyRange,
  naturalKey,
  validateBatch,
  type SnapshotStore
} from './snapshotStore.js';

const nullableText = z.string().nullable();
const nullableNumber = z.number().nullable();

const rowSchema = z.object({
  listingId: z.string().min(1),
  complexId: z.string().min(1),
  listingTypeName: nullableText,
  tradeTypeName: nullableText,
  priceRaw: nullableText,
  priceNormalized: z.number().int().nullable(),
  areaPrimary: nullableText,
  areaSecondary: nullableText,
  floorInfo: nullableText,
  direction: nullableText,
  latitude: nullableNumber,
  longitude: nullableNumber,
  tradePrice: nullableText,
  realtorName: nullableText,
  buildingName: nullableText,
  collectedAt: z.string().datetime(),
  description: nullableText,
  confirmedDate: nullableText,
  createdAt: z.string().datetime()
});

type Row = z.infer<typeof rowSchema>;

function toRow(record: ListingRecord, createdAt: Date): Row {
  return { ...record, collectedAt: record.collectedAt.toISOString(), createdAt: createdAt.toISOString() };
}

function fromRow(row: Row): ListingRecord {
  const { createdAt: _createdAt, collectedAt, ...rest } = row;
  return { ...rest, collectedAt: new Date(collectedAt) };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * One newline-delimited JSON file per complex under `dataDir`. Appends go
 * through a single write and are rolled back by truncation if it fails.
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly lock = new SerialLock();

  constructor(private readonly dataDir: string) {}

  private fileFor(complexId: string): string {
    return path.join(this.dataDir, `${encodeURIComponent(complexId)}.ndjson`);
  }

  private async readAll(complexId: string): Promise<ListingRecord[]> {
    const file = this.fileFor(complexId);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new StoreFailure('READ_FAILED', `could not read ${file}: ${errorMessage(err)}`, { cause: err });
    }

    const records: ListingRecord[] = [];
    const lines = content.split('\n');
    for (const [index, line] of lines.entries()) {
      if (line.trim().length === 0) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (err) {
        throw new StoreFailure('READ_FAILED', `${file}:${index + 1} is not valid JSON`, { cause: err });
      }
      const row = rowSchema.safeParse(parsed);
      if (!row.success) {
        throw new StoreFailure('READ_FAILED', `${file}:${index + 1} does not match the listing schema`, {
          cause: row.error
        });
      }
      records.push(fromRow(row.data));
    }
    return records;
  }

  async append(records: readonly ListingRecord[]): Promise<void> {
    const batch = validateBatch(records);
    if (!batch) return;

    await this.lock.run(async () => {
      const existing = await this.readAll(batch.complexId);
      const existingKeys = new Set(existing.map(naturalKey));
      const clash = records.find((r) => existingKeys.has(naturalKey(r)));
      if (clash) {
        throw new StoreFailure(
          'DUPLICATE_KEY',
          `listing ${clash.listingId} at ${clash.collectedAt.toISOString()} is already stored`
        );
      }

      const createdAt = new Date();
      const payload = records.map((r) => `${JSON.stringify(toRow(r, createdAt))}\n`).join('');
      const file = this.fileFor(batch.complexId);

      let previousSize = 0;
      try {
        await fs.mkdir(this.dataDir, { recursive: true });
        previousSize = await fs.stat(file).then(
          (s) => s.size,
          (err: unknown) => {
            if (isMissingFile(err)) return 0;
            throw err;
          }
        );
      } catch (err) {
        throw new StoreFailure('WRITE_FAILED', `could not prepare ${file}: ${errorMessage(err)}`, { cause: err });
      }

      try {
        await fs.appendFile(file, payload, 'utf8');
      } catch (err) {
        await fs.truncate(file, previousSize).catch((truncateErr: unknown) => {
          console.error('[store] rollback truncate failed', {
            file,
            previousSize,
            error: errorMessage(truncateErr)
          });
        });
        throw new StoreFailure('WRITE_FAILED', `could not append to ${file}: ${errorMessage(err)}`, { cause: err });
      }
    });
  }

  async query(complexId: string, range?: TimeRange): Promise<ListingRecord[]> {
    if (isEmptyRange(range)) return [];
    const records = await this.readAll(complexId);
    return records.filter((r) => inRange(r.collectedAt, range)).sort(compareRecords);
  }

  async listSnapshots(complexId: string, range?: TimeRange): Promise<SnapshotSummary[]> {
    const records = await this.query(complexId, range);
    const counts = new Map<number, number>();
    for (const record of records) {
      const ms = record.collectedAt.getTime();
      counts.set(ms, (counts.get(ms) ?? 0) + 1);
    }
    return [...counts.entries()].map(([ms, count]) => ({ complexId, collectedAt: new Date(ms), count }));
  }

  async listingHistory(complexId: string, listingId: string): Promise<ListingRecord[]> {
    const records = await this.readAll(complexId);
    return records.filter((r) => r.listingId === listingId).sort(compareRecords);
  }
}
