/**
 * Configuration type definitions
 * All thresholds, rules, and weights are defined here
 */

// Credentials and endpoints for external collaborators
export interface ApiConfig {
  googlePlacesKey?: string;
  openaiKey?: string;
  model: string;
  placesBaseUrl: string;
  requestTimeout: number;  // ms
}

// Discovery: keyword/city lists and radii (meters)
export interface SearchConfig {
  maxResults: number;
  tier1Radius: number;
  tier2Radius: number;
  defaultRadius: number;
  coreKeywords: string[];
  peripheralKeywords: string[];
  tier1Cities: string[];
  tier2Cities: string[];
  comprehensiveCities: string[];
  comprehensiveKeywords: string[];
  searchDelay: number;  // ms between comprehensive searches
}

// Noise filter and website validation terms
export interface FilterConfig {
  excludedTypes: string[];
  negativeKeywords: string[];
  minReviewCount: number;
  businessIndicators: string[];
}

export interface WebsiteRequiredWeights {
  industryMatch: number;
  websiteRequired: number;
  highRating: number;
  goodRating: number;
  sizeIndicator: number;
  usLocation: number;
  businessType: number;
}

export interface RatingThresholds {
  highRating: number;
  highReviews: number;
  goodRating: number;
  goodReviews: number;
}

export interface FitThresholds {
  highFit: number;
  mediumFit: number;
  lowFit: number;
}

export interface LegacyWeights {
  usLocation: number;
  highRating: number;
  goodRating: number;
  businessType: number;
  industryKeyword: number;
  sizeKeyword: number;
}

export interface LegacyScoringConfig {
  weights: LegacyWeights;
  industryTerms: string[];
  sizeTerms: string[];
  minScore: number;
}

export interface ScoringConfig {
  industryTerms: string[];
  sizeTerms: string[];
  weights: WebsiteRequiredWeights;
  ratingThresholds: RatingThresholds;
  fitThresholds: FitThresholds;
  legacy: LegacyScoringConfig;
}

// Language model call sites: pacing and token budgets
export interface AiConfig {
  precheckDelay: number;     // ms
  evaluationDelay: number;   // ms
  precheckMaxTokens: number;
  evaluationMaxTokens: number;
  precheckCap?: number;
  evaluationCap?: number;
  siteExcerptMaxChars: number;
  siteFetchTimeout: number;  // ms
  referenceProfile: string;
}

export interface WebsiteConfig {
  required: boolean;
  shortlistSize: number;     // 0 keeps every evaluated record
  fallbackToShortlist: boolean;
  timeout: number;           // ms
  lookupDelay: number;       // ms
}

// both = csv + json; all adds the xlsx workbook
export type OutputFormat = 'csv' | 'json' | 'xlsx' | 'both' | 'all';

export interface OutputConfig {
  format: OutputFormat;
  directory: string;
  filenamePrefix: string;
  sortByFitCategory: boolean;
  sortByRating: boolean;
}

// Main configuration interface
export interface ProspectorConfig {
  version: string;
  api: ApiConfig;
  search: SearchConfig;
  filters: FilterConfig;
  scoring: ScoringConfig;
  ai: AiConfig;
  website: WebsiteConfig;
  output: OutputConfig;
  usStates: string[];
}
