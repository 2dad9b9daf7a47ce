/**
 * Fit categorization
 * Buckets scored records into tiers by descending cut points; the rest are dropped
 */

import type { BusinessRecord, FitCategory } from '../state/types';
import type { FitThresholds } from '../config/types';

export interface CategorizedRecords {
  high: BusinessRecord[];
  medium: BusinessRecord[];
  low: BusinessRecord[];
}

export function fitCategoryFor(score: number, thresholds: FitThresholds): FitCategory | undefined {
  if (score >= thresholds.highFit) return 'High Fit';
  if (score >= thresholds.mediumFit) return 'Medium Fit';
  if (score >= thresholds.lowFit) return 'Low Fit';
  return undefined;
}

export function categorize(records: BusinessRecord[], thresholds: FitThresholds): CategorizedRecords {
  const result: CategorizedRecords = { high: [], medium: [], low: [] };

  for (const record of records) {
    const fitCategory = fitCategoryFor(record.icpScore ?? 0, thresholds);
    if (!fitCategory) {
      continue;
    }

    record.fitCategory = fitCategory;
    switch (fitCategory) {
      case 'High Fit':
        result.high.push(record);
        break;
      case 'Medium Fit':
        result.medium.push(record);
        break;
      case 'Low Fit':
        result.low.push(record);
        break;
    }
  }

  return result;
}
