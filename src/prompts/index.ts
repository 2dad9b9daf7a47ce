/**
 * Prompt builders for the language model call sites
 */

import type { BusinessRecord } from '../state/types';

export const PRECHECK_SYSTEM_ROLE = 'You are a B2B sales expert evaluating business information quality.';
export const EVALUATION_SYSTEM_ROLE = 'You are a B2B sales expert for regulated industries.';

function show(value: string | number | null | undefined): string {
  return value === null || value === undefined || value === '' ? 'N/A' : String(value);
}

function companyLines(record: BusinessRecord, includeWebsite: boolean): string[] {
  const lines = [
    `- Name: ${show(record.name)}`,
    `- City/State: ${show(record.city)}, ${show(record.state)}`,
    `- Keyword/Industry signal: ${show(record.keywordUsed)}`,
  ];
  if (includeWebsite) {
    lines.push(`- Website: ${show(record.website)}`);
  }
  lines.push(
    `- Google rating/reviews: ${show(record.rating)} (${show(record.reviewCount)})`,
    `- Types: ${show(record.categoryTags.join(', '))}`
  );
  return lines;
}

export function buildPrecheckPrompt(record: BusinessRecord): string {
  return [
    'Evaluate if this company has reliable business information for B2B prospecting.',
    '',
    'Company:',
    ...companyLines(record, false),
    '',
    'Does this company have reliable business information for B2B sales prospecting?',
    '',
    'Answer with only "Yes" or "No".',
  ].join('\n');
}

export function buildEvaluationPrompt(
  record: BusinessRecord,
  referenceProfile: string,
  siteExcerpt?: string | null
): string {
  return [
    'Evaluate this company as a prospect for compliance-driven, mission/safety-critical software services.',
    '',
    `Reference profile: ${referenceProfile}.`,
    '',
    'Company:',
    ...companyLines(record, true),
    '',
    'Website excerpt (if any):',
    siteExcerpt || 'N/A',
    '',
    'You must return EXACTLY these fields in this format:',
    '',
    'ai_fit_category: [High/Medium/Low] with one-sentence justification (e.g., "High: fits ICP due to industry and US presence")',
    'ai_reasoning: [Yes/No] with short explanation (e.g., "Yes: operates in medical device manufacturing in the US")',
    'ai_people_assessment: [summary of leadership/hiring signals or "Not enough data"]',
    'ai_revenue_assessment: [Early-stage/Small (<$5M)/Mid ($5-50M)/Large ($50M+)/Unknown based on size signals]',
    '',
    'Example format:',
    'ai_fit_category: High: fits ICP due to medical device manufacturing focus and US presence',
    'ai_reasoning: Yes: operates in medical device manufacturing in the US with regulatory compliance needs',
    'ai_people_assessment: Strong leadership team with technical backgrounds, active LinkedIn presence',
    'ai_revenue_assessment: Mid ($5-50M): established company with multiple locations and strong online presence',
  ].join('\n');
}
