/**
 * Ranking
 * Stable sort by tier ordinal, then rating; both descending
 */

import type { AiFitCategory, BusinessRecord, FitCategory } from '../state/types';
import { toNumber } from '../lib/utils';

export type TierOrdinal = (record: BusinessRecord) => number;

const FIT_ORDINALS: Record<FitCategory, number> = {
  'High Fit': 3,
  'Medium Fit': 2,
  'Low Fit': 1,
};

const AI_ORDINALS: Record<AiFitCategory, number> = {
  High: 3,
  Medium: 2,
  Low: 1,
  Unknown: 0,
};

export const fitTierOrdinal: TierOrdinal = (record) =>
  record.fitCategory ? FIT_ORDINALS[record.fitCategory] : 0;

export const aiTierOrdinal: TierOrdinal = (record) =>
  record.aiFitCategory ? AI_ORDINALS[record.aiFitCategory] : 0;

export interface RankOptions {
  byTier?: boolean;
  byRating?: boolean;
}

export function rankRecords(
  records: BusinessRecord[],
  tierOf: TierOrdinal = fitTierOrdinal,
  options: RankOptions = {}
): BusinessRecord[] {
  const byTier = options.byTier ?? true;
  const byRating = options.byRating ?? true;

  if (!byTier) {
    return [...records];
  }

  // Array.prototype.sort is stable, so ties keep discovery order
  return [...records].sort((a, b) => {
    const tierDiff = tierOf(b) - tierOf(a);
    if (tierDiff !== 0 || !byRating) {
      return tierDiff;
    }
    return toNumber(b.rating, 0) - toNumber(a.rating, 0);
  });
}
