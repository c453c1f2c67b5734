import { describe, expect, it } from 'vitest';
import { dedupeListings } from '../src/pipeline/dedupe.js';
import { makeListing } from './support/listings.js';

describe('dedupeListings', () => {
  it('keeps the first occurrence of each listingId in input order', () => {
    const a1 = makeListing({ listingId: 'A', priceNormalized: 1 });
    const b1 = makeListing({ listingId: 'B', priceNormalized: 2 });
    const a2 = makeListing({ listingId: 'A', priceNormalized: 3 });
    const c1 = makeListing({ listingId: 'C', priceNormalized: 4 });
    const b2 = makeListing({ listingId: 'B', priceNormalized: 5 });

    const { records, duplicates } = dedupeListings([a1, b1, a2, c1, b2]);

    expect(records).toEqual([a1, b1, c1]);
    expect(records[0]).toBe(a1);
    expect(duplicates).toBe(2);
  });

  it('returns input unchanged when there are no repeats', () => {
    const input = [makeListing({ listingId: 'A' }), makeListing({ listingId: 'B' })];

    expect(dedupeListings(input)).toEqual({ records: input, duplicates: 0 });
  });

  it('handles an empty run', () => {
    expect(dedupeListings([])).toEqual({ records: [], duplicates: 0 });
  });
});
