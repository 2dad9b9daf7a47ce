/**
 * Configuration loader
 * Loads and validates configuration from YAML/JSON files
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import { env, ensureDir } from '../lib/env';
import { logger } from '../lib/logger';
import { ConfigError, errorMessage } from '../lib/errors';
import { validateConfig } from './schema';
import type { ProspectorConfig } from './types';
import defaults from './defaults.json';

// Default configuration
export const DEFAULT_CONFIG: ProspectorConfig = {
  version: '1.0.0',
  api: {
    model: 'gpt-4o-mini',
    placesBaseUrl: 'https://maps.googleapis.com/maps/api',
    requestTimeout: 30000,
  },
  search: {
    maxResults: 100,
    tier1Radius: 50000,
    tier2Radius: 25000,
    defaultRadius: 50000,
    coreKeywords: defaults.coreKeywords,
    peripheralKeywords: defaults.peripheralKeywords,
    tier1Cities: defaults.tier1Cities,
    tier2Cities: defaults.tier2Cities,
    comprehensiveCities: defaults.comprehensiveCities,
    comprehensiveKeywords: defaults.comprehensiveKeywords,
    searchDelay: 500,
  },
  filters: {
    excludedTypes: defaults.excludedTypes,
    negativeKeywords: defaults.negativeKeywords,
    minReviewCount: 3,
    businessIndicators: defaults.businessIndicators,
  },
  scoring: {
    industryTerms: ['medical', 'manufacturing', 'defense', 'consulting', 'engineering', 'biotech'],
    sizeTerms: ['small', 'boutique', 'specialized', 'startup', 'family-owned'],
    weights: {
      industryMatch: 3,
      websiteRequired: 2,
      highRating: 2,
      goodRating: 1,
      sizeIndicator: 1,
      usLocation: 1,
      businessType: 1,
    },
    ratingThresholds: {
      highRating: 3.5,
      highReviews: 10,
      goodRating: 3.0,
      goodReviews: 5,
    },
    fitThresholds: {
      highFit: 7,
      mediumFit: 5,
      lowFit: 3,
    },
    legacy: {
      weights: {
        usLocation: 1,
        highRating: 1,
        goodRating: 0.5,
        businessType: 1,
        industryKeyword: 2,
        sizeKeyword: 1,
      },
      industryTerms: ['medical', 'manufacturing', 'defense', 'consulting'],
      sizeTerms: ['small', 'startup', 'boutique', 'specialized'],
      minScore: 2,
    },
  },
  ai: {
    precheckDelay: 300,
    evaluationDelay: 300,
    precheckMaxTokens: 10,
    evaluationMaxTokens: 500,
    siteExcerptMaxChars: 1200,
    siteFetchTimeout: 10000,
    referenceProfile:
      'software services for medical devices, defense, industrial automation; embedded/real-time; FDA/MIL-SPEC',
  },
  website: {
    required: true,
    shortlistSize: 20,
    fallbackToShortlist: true,
    timeout: 10000,
    lookupDelay: 100,
  },
  output: {
    format: 'csv',
    directory: env.DATA_DIR,
    filenamePrefix: 'prospecting_results',
    sortByFitCategory: true,
    sortByRating: true,
  },
  usStates: defaults.usStates,
};

export function defaultConfigPath(): string {
  return path.join(env.CONFIG_DIR, 'config.yaml');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;

    const current = result[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      result[key] = deepMerge(current, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function parseConfigFile(configFile: string): unknown {
  const content = fs.readFileSync(configFile, 'utf-8');
  try {
    return configFile.endsWith('.json') ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Could not parse ${configFile}: ${errorMessage(error)}`);
  }
}

// Environment variables win over keys stored in the file
function applyEnvOverrides(config: ProspectorConfig): ProspectorConfig {
  return {
    ...config,
    api: {
      ...config.api,
      googlePlacesKey: env.GOOGLE_PLACES_API_KEY ?? config.api.googlePlacesKey,
      openaiKey: env.OPENAI_API_KEY ?? config.api.openaiKey,
    },
  };
}

export function resolveConfig(userConfig: unknown): ProspectorConfig {
  let overrides: Record<string, unknown> = {};
  if (isPlainObject(userConfig)) {
    overrides = userConfig;
  } else if (userConfig !== null && userConfig !== undefined) {
    throw new ConfigError('Configuration root must be a mapping');
  }

  const merged = deepMerge({ ...DEFAULT_CONFIG }, overrides);
  const validation = validateConfig(merged);

  if (!validation.success) {
    throw new ConfigError(`Invalid configuration:\n${validation.errors.join('\n')}`);
  }

  return applyEnvOverrides(validation.data);
}

export function loadConfig(configPath?: string): ProspectorConfig {
  const yamlConfigFile = configPath || defaultConfigPath();
  const jsonConfigFile = configPath || path.join(env.CONFIG_DIR, 'config.json');

  let configFile: string;

  // Try YAML first, then JSON
  if (fs.existsSync(yamlConfigFile)) {
    configFile = yamlConfigFile;
  } else if (fs.existsSync(jsonConfigFile)) {
    configFile = jsonConfigFile;
  } else {
    throw new ConfigError(
      `Config file not found: ${yamlConfigFile}. Run "icp-prospector init-config" to create one.`
    );
  }

  logger.info(`Loading config from ${configFile}`);
  return resolveConfig(parseConfigFile(configFile));
}

export function writeDefaultConfig(configPath: string = defaultConfigPath()): void {
  if (fs.existsSync(configPath)) {
    throw new ConfigError(`Refusing to overwrite existing config: ${configPath}`);
  }

  ensureDir(path.dirname(configPath));

  const content = YAML.stringify(DEFAULT_CONFIG, { indent: 2 });
  fs.writeFileSync(configPath, content);
  logger.info(`Wrote default config to ${configPath}`);
}

export function requireApiKey(config: ProspectorConfig, service: 'googlePlaces' | 'openai'): string {
  const key = service === 'googlePlaces' ? config.api.googlePlacesKey : config.api.openaiKey;
  if (!key) {
    const variable = service === 'googlePlaces' ? 'GOOGLE_PLACES_API_KEY' : 'OPENAI_API_KEY';
    throw new ConfigError(`Missing API key for ${service}: set ${variable} or api.${service}Key`);
  }
  return key;
}
