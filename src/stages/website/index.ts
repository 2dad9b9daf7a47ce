/**
 * WEBSITE Stage
 * Goal: Keep only businesses with a reachable, business-focused website
 */

import { BaseStage } from '../base-stage';
import type { BusinessRecord } from '../../state/types';
import type { ProspectorConfig } from '../../config/types';
import type { PageFetcher, PlacesClient } from '../../clients/types';
import { logger } from '../../lib/logger';
import { containsAny, sleep } from '../../lib/utils';

export type WebsiteRejection = 'no_place_id' | 'details_unavailable' | 'no_website' | 'invalid_website' | 'lookup_error';

export class WebsiteStage extends BaseStage {
  private readonly places: PlacesClient;
  private readonly fetcher: PageFetcher;

  constructor(config: ProspectorConfig, places: PlacesClient, fetcher: PageFetcher) {
    super('website', config);
    this.places = places;
    this.fetcher = fetcher;
  }

  protected async execute(records: BusinessRecord[]): Promise<BusinessRecord[]> {
    const kept: BusinessRecord[] = [];

    for (const record of records) {
      this.processed++;

      const rejection = await this.check(record);
      if (rejection) {
        this.failed++;
        logger.logExclusion(record.name, rejection, { placeId: record.placeId });
      } else {
        kept.push(record);
        this.passed++;
        logger.debug(`${record.name}: ${record.website}`);
      }
    }

    logger.info('Website requirement results', {
      withValidWebsites: kept.length,
      excluded: this.failed,
    });
    return kept;
  }

  private async check(record: BusinessRecord): Promise<WebsiteRejection | null> {
    if (!record.placeId) {
      return 'no_place_id';
    }

    try {
      const details = await this.places.lookupDetails(record.placeId);
      await sleep(this.config.website.lookupDelay);

      if (!details) {
        return 'details_unavailable';
      }
      if (!details.website) {
        return 'no_website';
      }
      if (!(await this.validateWebsite(details.website))) {
        return 'invalid_website';
      }

      record.website = details.website;
      record.phone = details.phone;
      record.websiteValid = true;
      return null;
    } catch (error) {
      this.recordError(error, record.name);
      return 'lookup_error';
    }
  }

  // Reachable with HTTP 200 and mentions at least one business indicator
  async validateWebsite(url: string): Promise<boolean> {
    const content = await this.fetcher.fetchText(url, this.config.website.timeout);
    if (content === null) {
      logger.debug('Website inaccessible', { url });
      return false;
    }

    if (!containsAny(content, this.config.filters.businessIndicators)) {
      logger.debug('Website exists but is not business-focused', { url });
      return false;
    }

    return true;
  }
}

export { WebsiteStage as default };
