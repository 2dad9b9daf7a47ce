import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CONFIG } from '../../src/config/loader';
import type { ProspectorConfig } from '../../src/config/types';
import type { BusinessRecord } from '../../src/state/types';

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'icp-prospector-'));
}

// Defaults with every delay zeroed, small search lists and a private output dir
export function testConfig(): ProspectorConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.search.tier1Cities = ['New York, NY'];
  config.search.coreKeywords = ['medical device'];
  config.search.tier2Cities = [];
  config.search.peripheralKeywords = [];
  config.search.comprehensiveCities = ['New York, NY'];
  config.search.comprehensiveKeywords = ['medical device'];
  config.search.searchDelay = 0;
  config.ai.precheckDelay = 0;
  config.ai.evaluationDelay = 0;
  config.website.lookupDelay = 0;
  config.output.directory = tempDir();
  return config;
}

export function business(overrides: Partial<BusinessRecord> = {}): BusinessRecord {
  return {
    placeId: 'p1',
    name: 'Acme Medical Devices',
    address: '1 Main St, New York, NY',
    city: 'New York, NY',
    state: 'NY',
    categoryTags: ['establishment', 'business'],
    keywordUsed: 'medical device',
    rating: 4.2,
    reviewCount: 50,
    ...overrides,
  };
}

export const FIXED_NOW = (): Date => new Date(2024, 0, 2, 3, 4, 5);
