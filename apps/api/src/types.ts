// A1 매매 (sale), B1 전세 (lump-sum lease), B2 월세 (monthly rent)
export const TRADE_TYPES = ['A1', 'B1', 'B2'] as const;

export type TradeType = (typeof TRADE_TYPES)[number];

export interface TrackedComplex {
  id: string;
  name?: string;
}

export type RawListing = Record<string, unknown>;

export interface ListingRecord {
  listingId: string;
  complexId: string;

  listingTypeName: string | null;
  tradeTypeName: string | null;

  priceRaw: string | null;
  priceNormalized: number | null; // KRW

  areaPrimary: string | null;
  areaSecondary: string | null;
  floorInfo: string | null;
  direction: string | null;

  latitude: number | null;
  longitude: number | null;

  tradePrice: string | null;
  realtorName: string | null;
  buildingName: string | null;

  collectedAt: Date;

  description: string | null;
  confirmedDate: string | null;
}

export interface TimeRange {
  from?: Date;
  to?: Date;
}

export interface SnapshotSummary {
  complexId: string;
  collectedAt: Date;
  count: number;
}

export interface PriceChange {
  listingId: string;
  from: number;
  to: number;
  delta: number;
}

export interface SnapshotDiff {
  complexId: string;
  from: Date;
  to: Date;
  fromSnapshotAt: Date | null;
  toSnapshotAt: Date | null;
  disappeared: string[];
  appeared: string[];
  priceChanged: PriceChange[];
}

export interface CollectionResult {
  complexId: string;
  tradeType: TradeType;
  collectedAt: Date;
  fetched: number;
  stored: number;
  failed: number;
  duplicates: number;
}

/** Resolves to the upstream entries as received; shape checks happen in the normalizer. */
export type FetchListings = (complexId: string, tradeType: TradeType) => Promise<unknown[]>;
