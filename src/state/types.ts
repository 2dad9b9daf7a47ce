/**
 * Core type definitions for ICP Prospector
 * A BusinessRecord is created once by discovery and carried through every stage
 */

// The language model's own judgment of fit
export type AiFitCategory = 'High' | 'Medium' | 'Low' | 'Unknown';

// Score-derived tier assigned by categorization
export type FitCategory = 'High Fit' | 'Medium Fit' | 'Low Fit';

// Pipeline stages
export type StageName =
  | 'discover'
  | 'filter'
  | 'precheck'
  | 'evaluate'
  | 'website'
  | 'score'
  | 'output';

export type ScoreRule =
  | 'industry_match'
  | 'website_required'
  | 'high_rating'
  | 'good_rating'
  | 'size_indicator'
  | 'us_location'
  | 'business_type'
  | 'industry_keyword'
  | 'size_keyword';

export type ScoreBreakdown = Partial<Record<ScoreRule, number>>;

export interface AiEvaluationFields {
  aiFitCategory: AiFitCategory;
  aiReasoning: string;
  aiPeopleAssessment: string;
  aiRevenueAssessment: string;
}

export interface BusinessRecord extends Partial<AiEvaluationFields> {
  // Identity, unique within one discovery run
  placeId: string;

  name: string;
  address: string;
  city: string;
  state: string;
  categoryTags: string[];
  keywordUsed: string;

  rating: number | null;
  reviewCount: number | null;
  priceLevel?: number | null;
  businessStatus?: string | null;

  // Enrichment
  website?: string;
  phone?: string | null;
  websiteValid?: boolean;
  aiEvaluationText?: string;
  aiProspectScore?: number;
  icpScore?: number;
  scoreBreakdown?: ScoreBreakdown;
  fitCategory?: FitCategory;
}

export interface StageSummary {
  stage: StageName;
  success: boolean;
  processed: number;
  passed: number;
  failed: number;
  startedAt: number;
  completedAt: number;
}
