/**
 * Noise filter
 * Drops businesses in excluded categories, with excluded name terms, or too few reviews
 */

import type { BusinessRecord } from '../state/types';
import { containsAny, toNumber } from '../lib/utils';

export interface NoiseCriteria {
  excludedCategories: readonly string[];
  excludedNameTerms: readonly string[];
  minReviewCount: number;
}

export type NoiseReason = 'excluded_category' | 'excluded_name' | 'low_reviews';

export interface NoiseFilterResult {
  kept: BusinessRecord[];
  excludedCount: number;
}

// Every matching reason, in check order; empty means the record is kept
export function noiseReasons(record: BusinessRecord, criteria: NoiseCriteria): NoiseReason[] {
  const reasons: NoiseReason[] = [];

  const tags = record.categoryTags ?? [];
  if (tags.some((tag) => containsAny(tag, criteria.excludedCategories))) {
    reasons.push('excluded_category');
  }

  if (containsAny(record.name ?? '', criteria.excludedNameTerms)) {
    reasons.push('excluded_name');
  }

  if (toNumber(record.reviewCount, 0) < criteria.minReviewCount) {
    reasons.push('low_reviews');
  }

  return reasons;
}

export function filterNoise(records: BusinessRecord[], criteria: NoiseCriteria): NoiseFilterResult {
  const kept = records.filter((record) => noiseReasons(record, criteria).length === 0);
  return { kept, excludedCount: records.length - kept.length };
}
