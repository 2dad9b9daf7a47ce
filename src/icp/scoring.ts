/**
 * ICP scoring engine
 *
 * One engine, two named rule sets. Rules are independent and additive: every
 * rule that applies fires and records the points it awarded in the breakdown,
 * so `icpScore` is always the sum of `scoreBreakdown`.
 *
 * - `websiteRequired` runs after the website gate in the refined flow and
 *   rewards a validated website.
 * - `legacy` runs early in the comprehensive flow, uses fractional points and
 *   comes with a minimum-score admission gate.
 */

import type { BusinessRecord, ScoreBreakdown, ScoreRule } from '../state/types';
import type {
  LegacyWeights,
  ProspectorConfig,
  RatingThresholds,
  WebsiteRequiredWeights,
} from '../config/types';
import { containsAny, toNumber } from '../lib/utils';

export interface WebsiteRequiredProfile {
  kind: 'websiteRequired';
  weights: WebsiteRequiredWeights;
  ratingThresholds: RatingThresholds;
  industryTerms: readonly string[];
  sizeTerms: readonly string[];
}

export interface LegacyProfile {
  kind: 'legacy';
  weights: LegacyWeights;
  ratingThresholds: Pick<RatingThresholds, 'highRating' | 'goodRating'>;
  industryTerms: readonly string[];
  sizeTerms: readonly string[];
  minScore: number;
}

export type ScoringProfile = WebsiteRequiredProfile | LegacyProfile;

export type ScoredRecord = BusinessRecord & { icpScore: number; scoreBreakdown: ScoreBreakdown };

export function websiteRequiredProfile(config: ProspectorConfig): WebsiteRequiredProfile {
  return {
    kind: 'websiteRequired',
    weights: config.scoring.weights,
    ratingThresholds: config.scoring.ratingThresholds,
    industryTerms: config.scoring.industryTerms,
    sizeTerms: config.scoring.sizeTerms,
  };
}

export function legacyProfile(config: ProspectorConfig): LegacyProfile {
  const { legacy, ratingThresholds } = config.scoring;
  return {
    kind: 'legacy',
    weights: legacy.weights,
    ratingThresholds: {
      highRating: ratingThresholds.highRating,
      goodRating: ratingThresholds.goodRating,
    },
    industryTerms: legacy.industryTerms,
    sizeTerms: legacy.sizeTerms,
    minScore: legacy.minScore,
  };
}

class ScoreSheet {
  readonly breakdown: ScoreBreakdown = {};

  award(rule: ScoreRule, points: number): void {
    this.breakdown[rule] = points;
  }

  total(): number {
    return Object.values(this.breakdown).reduce((sum, points) => sum + (points ?? 0), 0);
  }
}

function hasTagContaining(record: BusinessRecord, term: string): boolean {
  return (record.categoryTags ?? []).some((tag) => tag.toLowerCase().includes(term));
}

function scoreWebsiteRequired(record: BusinessRecord, profile: WebsiteRequiredProfile, states: ReadonlySet<string>): ScoreSheet {
  const sheet = new ScoreSheet();
  const { weights, ratingThresholds } = profile;
  const keyword = record.keywordUsed ?? '';

  if (containsAny(keyword, profile.industryTerms)) {
    sheet.award('industry_match', weights.industryMatch);
  }

  if (record.websiteValid === true) {
    sheet.award('website_required', weights.websiteRequired);
  }

  const rating = toNumber(record.rating, 0);
  const reviews = Math.trunc(toNumber(record.reviewCount, 0));
  if (rating >= ratingThresholds.highRating && reviews >= ratingThresholds.highReviews) {
    sheet.award('high_rating', weights.highRating);
  } else if (rating >= ratingThresholds.goodRating && reviews >= ratingThresholds.goodReviews) {
    sheet.award('good_rating', weights.goodRating);
  }

  if (containsAny(keyword, profile.sizeTerms)) {
    sheet.award('size_indicator', weights.sizeIndicator);
  }

  if (states.has(record.state)) {
    sheet.award('us_location', weights.usLocation);
  }

  if (hasTagContaining(record, 'establishment') && hasTagContaining(record, 'business')) {
    sheet.award('business_type', weights.businessType);
  }

  return sheet;
}

function scoreLegacy(record: BusinessRecord, profile: LegacyProfile, states: ReadonlySet<string>): ScoreSheet {
  const sheet = new ScoreSheet();
  const { weights, ratingThresholds } = profile;
  const keyword = record.keywordUsed ?? '';

  if (states.has(record.state)) {
    sheet.award('us_location', weights.usLocation);
  }

  // Only rated businesses take part in the rating tier
  if (record.rating !== null && record.rating !== undefined) {
    const rating = toNumber(record.rating, 0);
    if (rating >= ratingThresholds.highRating) {
      sheet.award('high_rating', weights.highRating);
    } else if (rating >= ratingThresholds.goodRating) {
      sheet.award('good_rating', weights.goodRating);
    }
  }

  if (hasTagContaining(record, 'establishment') || hasTagContaining(record, 'business')) {
    sheet.award('business_type', weights.businessType);
  }

  if (containsAny(keyword, profile.industryTerms)) {
    sheet.award('industry_keyword', weights.industryKeyword);
  } else if (containsAny(keyword, profile.sizeTerms)) {
    sheet.award('size_keyword', weights.sizeKeyword);
  }

  return sheet;
}

export function scoreRecord(
  record: BusinessRecord,
  profile: ScoringProfile,
  targetStates: Iterable<string>
): ScoredRecord {
  const states: ReadonlySet<string> = targetStates instanceof Set ? targetStates : new Set(targetStates);

  const sheet =
    profile.kind === 'websiteRequired'
      ? scoreWebsiteRequired(record, profile, states)
      : scoreLegacy(record, profile, states);

  return {
    ...record,
    icpScore: sheet.total(),
    scoreBreakdown: sheet.breakdown,
  };
}

// Legacy admission gate: keep records scoring at least the profile minimum
export function admitByMinimumScore(records: ScoredRecord[], profile: LegacyProfile): ScoredRecord[] {
  return records.filter((record) => record.icpScore >= profile.minScore);
}
