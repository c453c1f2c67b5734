import { describe, expect, it } from 'vitest';
import { normalizeListing, parsePrice } from '../src/pipeline/normalize.js';

const ctx = { complexId: '108064', collectedAt: new Date('2025-03-01T00:00:00.000Z') };

describe('parsePrice', () => {
  it('scales 억 and the 만원 remainder', () => {
    expect(parsePrice('15억')).toBe(1_500_000_000);
    expect(parsePrice('10억 5,000')).toBe(1_050_000_000);
    expect(parsePrice('3억 5,000')).toBe(350_000_000);
    expect(parsePrice('1.5억')).toBe(150_000_000);
  });

  it('treats bare amounts as 만원', () => {
    expect(parsePrice('9,500')).toBe(95_000_000);
    expect(parsePrice('9,500만원')).toBe(95_000_000);
    expect(parsePrice('  800만 ')).toBe(8_000_000);
  });

  it('takes the deposit from a deposit/monthly quote', () => {
    expect(parsePrice('1억/150')).toBe(100_000_000);
    expect(parsePrice('5,000/120')).toBe(50_000_000);
  });

  it('returns null for anything it cannot read', () => {
    expect(parsePrice('가격문의')).toBeNull();
    expect(parsePrice('')).toBeNull();
    expect(parsePrice('   ')).toBeNull();
    expect(parsePrice('억')).toBeNull();
    expect(parsePrice('10억 abc')).toBeNull();
    expect(parsePrice(null)).toBeNull();
    expect(parsePrice(150000)).toBeNull();
  });

  it('is deterministic for the same input', () => {
    expect(parsePrice('12억 3,000')).toBe(parsePrice('12억 3,000'));
  });
});

describe('normalizeListing', () => {
  it('maps upstream article fields onto a listing record', () => {
    const result = normalizeListing(
      {
        atclNo: '2501234567',
        atclNm: 'DMC파크뷰자이',
        rletTpNm: '아파트',
        tradTpNm: '매매',
        prcInfo: '10억 5,000',
        spc1: '112',
        spc2: '84.97',
        flrInfo: '12/25',
        direction: '남향',
        lat: 37.58,
        lng: '126.89',
        hanPrc: '10억 5,000',
        rltrNm: '파크공인중개사',
        bildNm: '101동',
        atclFetrDesc: '  로얄층   남향  ',
        atclCfmYmd: '25.02.28.',
        somethingElse: 'ignored'
      },
      ctx
    );

    expect(result).toEqual({
      ok: true,
      record: {
        listingId: '2501234567',
        complexId: '108064',
        listingTypeName: '아파트',
        tradeTypeName: '매매',
        priceRaw: '10억 5,000',
        priceNormalized: 1_050_000_000,
        areaPrimary: '112',
        areaSecondary: '84.97',
        floorInfo: '12/25',
        direction: '남향',
        latitude: 37.58,
        longitude: 126.89,
        tradePrice: '10억 5,000',
        realtorName: '파크공인중개사',
        buildingName: '101동',
        collectedAt: ctx.collectedAt,
        description: '로얄층 남향',
        confirmedDate: '25.02.28.'
      }
    });
  });

  it('accepts rows written with the older column names', () => {
    const result = normalizeListing(
      { articleNo: 77, price: '8억', floorInfo: '3/15', cfmYmd: '24.12.01.', realtorName: 'A공인' },
      ctx
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.listingId).toBe('77');
    expect(result.record.priceRaw).toBe('8억');
    expect(result.record.priceNormalized).toBe(800_000_000);
    expect(result.record.floorInfo).toBe('3/15');
    expect(result.record.confirmedDate).toBe('24.12.01.');
    expect(result.record.realtorName).toBe('A공인');
  });

  it('fills missing known fields with null', () => {
    const result = normalizeListing({ atclNo: 'x1' }, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.priceRaw).toBeNull();
    expect(result.record.priceNormalized).toBeNull();
    expect(result.record.latitude).toBeNull();
    expect(result.record.description).toBeNull();
  });

  it('keeps the record when the price cannot be parsed', () => {
    const result = normalizeListing({ atclNo: 'x2', prcInfo: '협의' }, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.priceRaw).toBe('협의');
    expect(result.record.priceNormalized).toBeNull();
  });

  it('treats unusable coordinates as null', () => {
    const result = normalizeListing({ atclNo: 'x3', lat: 'north', lng: Number.NaN }, ctx);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.record.latitude).toBeNull();
    expect(result.record.longitude).toBeNull();
  });

  it('fails without a listing id instead of throwing', () => {
    expect(normalizeListing({ prcInfo: '5억' }, ctx)).toEqual({
      ok: false,
      reason: 'MISSING_LISTING_ID',
      raw: { prcInfo: '5억' }
    });
    expect(normalizeListing({ atclNo: '   ' }, ctx)).toMatchObject({ ok: false, reason: 'MISSING_LISTING_ID' });
  });

  it('fails for values that are not objects', () => {
    expect(normalizeListing('atclNo=1', ctx)).toMatchObject({ ok: false, reason: 'NOT_AN_OBJECT' });
    expect(normalizeListing(null, ctx)).toMatchObject({ ok: false, reason: 'NOT_AN_OBJECT' });
    expect(normalizeListing([{ atclNo: '1' }], ctx)).toMatchObject({ ok: false, reason: 'NOT_AN_OBJECT' });
  });
});
