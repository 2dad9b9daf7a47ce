/**
 * DISCOVER Stage
 * Goal: Identify businesses near the configured cities for the configured keywords
 */

import { BaseStage } from '../base-stage';
import type { BusinessRecord } from '../../state/types';
import type { ProspectorConfig } from '../../config/types';
import type { PlaceResult, PlacesClient } from '../../clients/types';
import { extractState } from '../../icp/location';
import { logger } from '../../lib/logger';
import { sleep } from '../../lib/utils';

export type DiscoveryStrategy = 'optimized' | 'comprehensive';

export function toBusinessRecord(
  place: PlaceResult,
  city: string,
  keyword: string,
  states: ReadonlySet<string>
): BusinessRecord {
  return {
    placeId: place.placeId,
    name: place.name,
    address: place.vicinity,
    city,
    state: extractState(place.vicinity, states),
    categoryTags: place.types,
    keywordUsed: keyword,
    rating: place.rating,
    reviewCount: place.userRatingsTotal,
    priceLevel: place.priceLevel,
    businessStatus: place.businessStatus,
  };
}

export class DiscoverStage extends BaseStage {
  private readonly places: PlacesClient;
  private readonly strategy: DiscoveryStrategy;
  private readonly limit: number;
  private readonly states: ReadonlySet<string>;

  constructor(config: ProspectorConfig, places: PlacesClient, strategy: DiscoveryStrategy, limit?: number) {
    super('discover', config);
    this.places = places;
    this.strategy = strategy;
    this.limit = limit || config.search.maxResults;
    this.states = new Set(config.usStates);
  }

  protected async execute(): Promise<BusinessRecord[]> {
    const records =
      this.strategy === 'optimized' ? await this.discoverOptimized() : await this.discoverComprehensive();

    this.passed = records.length;
    logger.info('Discovery complete', { strategy: this.strategy, discovered: records.length });
    return records;
  }

  // One query; records whose place id was already seen in this run are skipped.
  // A failed query yields nothing and the search loop moves on.
  private async search(city: string, keyword: string, radius: number): Promise<BusinessRecord[]> {
    let places: PlaceResult[];
    try {
      places = await this.places.discover(city, keyword, radius);
    } catch (error) {
      this.recordError(error, `${city} - ${keyword}`);
      return [];
    }
    this.processed += places.length;

    const fresh: BusinessRecord[] = [];
    for (const place of places) {
      if (this.run && !this.run.markSeen(place.placeId)) {
        continue;
      }
      fresh.push(toBusinessRecord(place, city, keyword, this.states));
    }

    logger.info(`${city} - '${keyword}': ${fresh.length} companies`);
    return fresh;
  }

  // Core keywords in tier-1 cities first, then peripheral keywords in tier-2 cities
  private async discoverOptimized(): Promise<BusinessRecord[]> {
    const { search } = this.config;

    const core: BusinessRecord[] = [];
    for (const city of search.tier1Cities) {
      for (const keyword of search.coreKeywords) {
        core.push(...(await this.search(city, keyword, search.tier1Radius)));
        if (core.length >= this.limit) {
          logger.info('Reached discovery limit during core searches', { limit: this.limit });
          return core.slice(0, this.limit);
        }
      }
    }
    logger.info(`Total core ICP results: ${core.length}`);

    const peripheral: BusinessRecord[] = [];
    for (const city of search.tier2Cities) {
      for (const keyword of search.peripheralKeywords) {
        peripheral.push(...(await this.search(city, keyword, search.tier2Radius)));
        if (core.length + peripheral.length >= this.limit) {
          logger.info('Reached discovery limit during peripheral searches', { limit: this.limit });
          return [...core, ...peripheral.slice(0, this.limit - core.length)];
        }
      }
    }
    logger.info(`Total peripheral results: ${peripheral.length}`);

    return [...core, ...peripheral];
  }

  // Every city against every keyword, paced by a fixed delay
  private async discoverComprehensive(): Promise<BusinessRecord[]> {
    const { search } = this.config;
    const total = search.comprehensiveCities.length * search.comprehensiveKeywords.length;
    let current = 0;

    logger.info(`Starting comprehensive search`, {
      cities: search.comprehensiveCities.length,
      keywords: search.comprehensiveKeywords.length,
      searches: total,
    });

    const all: BusinessRecord[] = [];
    for (const city of search.comprehensiveCities) {
      for (const keyword of search.comprehensiveKeywords) {
        current++;
        logger.debug(`Progress: ${current}/${total}`);

        all.push(...(await this.search(city, keyword, search.defaultRadius)));
        await sleep(search.searchDelay);

        if (all.length >= this.limit) {
          logger.info(`Reached target of ${this.limit} companies`);
          return all.slice(0, this.limit);
        }
      }
    }

    return all;
  }
}

export { DiscoverStage as default };
