import { describe, it, expect } from 'vitest';
import { aiTierOrdinal, fitTierOrdinal, rankRecords } from '../../src/icp/rank';
import { business } from '../helpers/config';

describe('rankRecords', () => {
  it('keeps the original order for equal tiers already sorted by rating', () => {
    const records = [
      business({ placeId: 'first', fitCategory: 'Medium Fit', rating: 4.0 }),
      business({ placeId: 'second', fitCategory: 'Medium Fit', rating: 3.5 }),
    ];

    expect(rankRecords(records).map((r) => r.placeId)).toEqual(['first', 'second']);
  });

  it('orders by tier, then rating, with missing ratings last', () => {
    const records = [
      business({ placeId: 'low', fitCategory: 'Low Fit', rating: 5 }),
      business({ placeId: 'mid-unrated', fitCategory: 'Medium Fit', rating: null }),
      business({ placeId: 'high', fitCategory: 'High Fit', rating: 3.1 }),
      business({ placeId: 'mid-rated', fitCategory: 'Medium Fit', rating: 4.4 }),
    ];

    expect(rankRecords(records, fitTierOrdinal).map((r) => r.placeId)).toEqual([
      'high',
      'mid-rated',
      'mid-unrated',
      'low',
    ]);
  });

  it('keeps ties in input order', () => {
    const records = ['a', 'b', 'c'].map((placeId) => business({ placeId, fitCategory: 'High Fit', rating: 4 }));
    expect(rankRecords(records).map((r) => r.placeId)).toEqual(['a', 'b', 'c']);
  });

  it('ranks by the language model category when asked', () => {
    const records = [
      business({ placeId: 'unknown', aiFitCategory: 'Unknown' }),
      business({ placeId: 'low', aiFitCategory: 'Low' }),
      business({ placeId: 'high', aiFitCategory: 'High' }),
      business({ placeId: 'none' }),
    ];

    expect(rankRecords(records, aiTierOrdinal).map((r) => r.placeId)).toEqual(['high', 'low', 'unknown', 'none']);
  });

  it('ignores rating when rating order is off', () => {
    const records = [
      business({ placeId: 'a', fitCategory: 'Low Fit', rating: 3 }),
      business({ placeId: 'b', fitCategory: 'Low Fit', rating: 5 }),
    ];
    expect(rankRecords(records, fitTierOrdinal, { byRating: false }).map((r) => r.placeId)).toEqual(['a', 'b']);
  });

  it('returns a copy without sorting when tier order is off', () => {
    const records = [
      business({ placeId: 'a', fitCategory: 'Low Fit' }),
      business({ placeId: 'b', fitCategory: 'High Fit' }),
    ];
    const ranked = rankRecords(records, fitTierOrdinal, { byTier: false });
    expect(ranked.map((r) => r.placeId)).toEqual(['a', 'b']);
    expect(ranked).not.toBe(records);
  });
});
