/**
 * FILTER Stage
 * Goal: Eliminate businesses outside the target profile before any paid API call
 */

import { BaseStage } from '../base-stage';
import type { BusinessRecord } from '../../state/types';
import type { ProspectorConfig } from '../../config/types';
import { noiseReasons, type NoiseCriteria } from '../../icp/noise-filter';
import { logger } from '../../lib/logger';

export function noiseCriteria(config: ProspectorConfig): NoiseCriteria {
  return {
    excludedCategories: config.filters.excludedTypes,
    excludedNameTerms: config.filters.negativeKeywords,
    minReviewCount: config.filters.minReviewCount,
  };
}

export class FilterStage extends BaseStage {
  constructor(config: ProspectorConfig) {
    super('filter', config);
  }

  protected async execute(records: BusinessRecord[]): Promise<BusinessRecord[]> {
    const criteria = noiseCriteria(this.config);
    const kept: BusinessRecord[] = [];

    for (const record of records) {
      this.processed++;

      const reasons = noiseReasons(record, criteria);
      if (reasons.length > 0) {
        this.failed++;
        logger.logExclusion(record.name, reasons.join(','), { placeId: record.placeId });
      } else {
        kept.push(record);
        this.passed++;
      }
    }

    logger.info(`Filtered out ${this.failed} irrelevant businesses`, { remaining: kept.length });
    return kept;
  }
}

export { FilterStage as default };
