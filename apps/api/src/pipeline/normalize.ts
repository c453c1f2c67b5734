import type { ListingRecord, RawListing } from '../types.js';

export interface NormalizeContext {
  complexId: string;
  collectedAt: Date;
}

export type NormalizeFailureReason = 'NOT_AN_OBJECT' | 'MISSING_LISTING_ID';

export type NormalizeResult =
  | { ok: true; record: ListingRecord }
  | { ok: false; reason: NormalizeFailureReason; raw: unknown };

type TextField = Exclude<
  keyof ListingRecord,
  'listingId' | 'complexId' | 'priceNormalized' | 'latitude' | 'longitude' | 'collectedAt'
>;

// Upstream (m.land) keys first, then the column names older exports were written with.
const TEXT_FIELDS: Record<TextField, readonly string[]> = {
  listingTypeName: ['rletTpNm', 'listingTypeName'],
  tradeTypeName: ['tradTpNm', 'tradeTypeName'],
  priceRaw: ['prcInfo', 'price', 'priceRaw'],
  areaPrimary: ['spc1', 'areaPrimary'],
  areaSecondary: ['spc2', 'areaSecondary'],
  floorInfo: ['flrInfo', 'floorInfo'],
  direction: ['direction'],
  tradePrice: ['tradePrc', 'hanPrc', 'tradePrice'],
  realtorName: ['rltrNm', 'realtorName'],
  buildingName: ['bildNm', 'buildingName'],
  description: ['atclFetrDesc', 'description'],
  confirmedDate: ['atclCfmYmd', 'cfmYmd', 'confirmedDate']
};

const LISTING_ID_KEYS = ['atclNo', 'articleNo', 'listingId'] as const;
const LATITUDE_KEYS = ['lat', 'latitude'] as const;
const LONGITUDE_KEYS = ['lng', 'longitude'] as const;

const EOK = 100_000_000;
const MAN = 10_000;

function isRecord(value: unknown): value is RawListing {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function getText(obj: RawListing, key: string): string | null {
  const v = obj[key];
  if (typeof v === 'string') {
    const text = normalizeWhitespace(v);
    return text.length > 0 ? text : null;
  }
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return null;
}

function getNumeric(obj: RawListing, key: string): number | null {
  const v = obj[key];

  if (typeof v === 'number') {
    return Number.isFinite(v) ? v : null;
  }

  if (typeof v === 'string') {
    const trimmed = v.trim();
    if (trimmed.length === 0) return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }

  return null;
}

function firstOf<T>(obj: RawListing, keys: readonly string[], read: (o: RawListing, k: string) => T | null): T | null {
  for (const key of keys) {
    const value = read(obj, key);
    if (value !== null) return value;
  }
  return null;
}

/**
 * Parses an upstream price string into KRW.
 *
 * Amounts are quoted in 만원 with 억 as the larger unit, e.g. `10억 5,000` is
 * 1,050,000,000 and `9,500` is 95,000,000. Rent quotes of the form
 * `deposit/monthly` resolve to the deposit. Returns null for anything else.
 */
export function parsePrice(priceRaw: unknown): number | null {
  if (typeof priceRaw !== 'string') return null;

  let text = priceRaw.replace(/[,\s]/g, '').replace(/원$/, '');
  const slash = text.indexOf('/');
  if (slash !== -1) text = text.slice(0, slash);
  if (text.length === 0) return null;

  const match = /^(?:(\d+(?:\.\d+)?)억)?(?:(\d+)만?)?$/.exec(text);
  if (!match) return null;

  const [, eokPart, manPart] = match;
  if (eokPart === undefined && manPart === undefined) return null;

  const eok = eokPart === undefined ? 0 : Math.round(Number(eokPart) * EOK);
  const man = manPart === undefined ? 0 : Number(manPart) * MAN;
  const total = eok + man;

  return Number.isSafeInteger(total) ? total : null;
}

export function normalizeListing(raw: unknown, ctx: NormalizeContext): NormalizeResult {
  if (!isRecord(raw)) return { ok: false, reason: 'NOT_AN_OBJECT', raw };

  const listingId = firstOf(raw, LISTING_ID_KEYS, getText);
  if (listingId === null) return { ok: false, reason: 'MISSING_LISTING_ID', raw };

  const text = (field: TextField) => firstOf(raw, TEXT_FIELDS[field], getText);
  const priceRaw = text('priceRaw');

  return {
    ok: true,
    record: {
      listingId,
      complexId: ctx.complexId,
      listingTypeName: text('listingTypeName'),
      tradeTypeName: text('tradeTypeName'),
      priceRaw,
      priceNormalized: parsePrice(priceRaw),
      areaPrimary: text('areaPrimary'),
      areaSecondary: text('areaSecondary'),
      floorInfo: text('floorInfo'),
      direction: text('direction'),
      latitude: firstOf(raw, LATITUDE_KEYS, getNumeric),
      longitude: firstOf(raw, LONGITUDE_KEYS, getNumeric),
      tradePrice: text('tradePrice'),
      realtorName: text('realtorName'),
      buildingName: text('buildingName'),
      collectedAt: ctx.collectedAt,
      description: text('description'),
      confirmedDate: text('confirmedDate')
    }
  };
}
