/**
 * Zod schema for validating the merged configuration
 */

import { z } from 'zod';
import type { ProspectorConfig } from './types';

const nonNegative = z.number().finite().min(0);
const terms = z.array(z.string());

const ApiSchema = z.object({
  googlePlacesKey: z.string().optional(),
  openaiKey: z.string().optional(),
  model: z.string().min(1),
  placesBaseUrl: z.string().url(),
  requestTimeout: nonNegative,
});

const SearchSchema = z.object({
  maxResults: z.number().int().positive(),
  tier1Radius: z.number().positive(),
  tier2Radius: z.number().positive(),
  defaultRadius: z.number().positive(),
  coreKeywords: terms,
  peripheralKeywords: terms,
  tier1Cities: terms,
  tier2Cities: terms,
  comprehensiveCities: terms,
  comprehensiveKeywords: terms,
  searchDelay: nonNegative,
});

const FilterSchema = z.object({
  excludedTypes: terms,
  negativeKeywords: terms,
  minReviewCount: nonNegative,
  businessIndicators: terms,
});

const ScoringSchema = z.object({
  industryTerms: terms,
  sizeTerms: terms,
  weights: z.object({
    industryMatch: nonNegative,
    websiteRequired: nonNegative,
    highRating: nonNegative,
    goodRating: nonNegative,
    sizeIndicator: nonNegative,
    usLocation: nonNegative,
    businessType: nonNegative,
  }),
  ratingThresholds: z.object({
    highRating: nonNegative,
    highReviews: nonNegative,
    goodRating: nonNegative,
    goodReviews: nonNegative,
  }),
  fitThresholds: z
    .object({
      highFit: z.number().finite(),
      mediumFit: z.number().finite(),
      lowFit: z.number().finite(),
    })
    .refine((t) => t.highFit >= t.mediumFit && t.mediumFit >= t.lowFit, {
      message: 'fit thresholds must be descending (highFit >= mediumFit >= lowFit)',
    }),
  legacy: z.object({
    weights: z.object({
      usLocation: nonNegative,
      highRating: nonNegative,
      goodRating: nonNegative,
      businessType: nonNegative,
      industryKeyword: nonNegative,
      sizeKeyword: nonNegative,
    }),
    industryTerms: terms,
    sizeTerms: terms,
    minScore: z.number().finite(),
  }),
});

const AiSchema = z.object({
  precheckDelay: nonNegative,
  evaluationDelay: nonNegative,
  precheckMaxTokens: z.number().int().positive(),
  evaluationMaxTokens: z.number().int().positive(),
  precheckCap: z.number().int().positive().optional(),
  evaluationCap: z.number().int().positive().optional(),
  siteExcerptMaxChars: z.number().int().positive(),
  siteFetchTimeout: z.number().positive(),
  referenceProfile: z.string(),
});

const WebsiteSchema = z.object({
  required: z.boolean(),
  shortlistSize: z.number().int().min(0),
  fallbackToShortlist: z.boolean(),
  timeout: z.number().positive(),
  lookupDelay: nonNegative,
});

const OutputSchema = z.object({
  format: z.enum(['csv', 'json', 'xlsx', 'both', 'all']),
  directory: z.string().min(1),
  filenamePrefix: z.string().min(1),
  sortByFitCategory: z.boolean(),
  sortByRating: z.boolean(),
});

export const ProspectorConfigSchema: z.ZodType<ProspectorConfig> = z.object({
  version: z.string(),
  api: ApiSchema,
  search: SearchSchema,
  filters: FilterSchema,
  scoring: ScoringSchema,
  ai: AiSchema,
  website: WebsiteSchema,
  output: OutputSchema,
  usStates: terms,
});

export type ValidationResult =
  | { success: true; data: ProspectorConfig }
  | { success: false; errors: string[] };

export function validateConfig(raw: unknown): ValidationResult {
  const result = ProspectorConfigSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}
