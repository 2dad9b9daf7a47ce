/**
 * Parsers for free-text language model output
 *
 * The evaluation prompt asks for four labelled lines. Replies are only
 * semi-structured, so parsing is line oriented and tolerant: unknown lines are
 * ignored, missing fields get defaults, nothing throws.
 */

import type { AiEvaluationFields, AiFitCategory } from '../state/types';

export const EVALUATION_DEFAULTS: Readonly<AiEvaluationFields> = {
  aiFitCategory: 'Unknown',
  aiReasoning: 'Not evaluated',
  aiPeopleAssessment: 'Not enough data',
  aiRevenueAssessment: 'Unknown',
};

type TextField = Exclude<keyof AiEvaluationFields, 'aiFitCategory'>;

const TEXT_PREFIXES: ReadonlyArray<[string, TextField]> = [
  ['ai_reasoning:', 'aiReasoning'],
  ['ai_people_assessment:', 'aiPeopleAssessment'],
  ['ai_revenue_assessment:', 'aiRevenueAssessment'],
];

const FIT_PREFIX = 'ai_fit_category:';

// Checked in this order; the first token present wins even if others appear
const FIT_PRIORITY: ReadonlyArray<Exclude<AiFitCategory, 'Unknown'>> = ['High', 'Medium', 'Low'];

export function fitCategoryFromText(content: string): AiFitCategory {
  return FIT_PRIORITY.find((token) => content.includes(token)) ?? 'Unknown';
}

export function applyEvaluationDefaults(fields: Partial<AiEvaluationFields>): AiEvaluationFields {
  return {
    aiFitCategory: fields.aiFitCategory ?? EVALUATION_DEFAULTS.aiFitCategory,
    aiReasoning: fields.aiReasoning ?? EVALUATION_DEFAULTS.aiReasoning,
    aiPeopleAssessment: fields.aiPeopleAssessment ?? EVALUATION_DEFAULTS.aiPeopleAssessment,
    aiRevenueAssessment: fields.aiRevenueAssessment ?? EVALUATION_DEFAULTS.aiRevenueAssessment,
  };
}

/**
 * Parse the four labelled evaluation lines.
 *
 * Empty or absent text yields `{}` so the caller can tell "no reply" apart
 * from "reply without fields"; any other text yields the full field set.
 */
export function parseEvaluation(text: string | null | undefined): Partial<AiEvaluationFields> {
  if (!text) {
    return {};
  }

  const fields: Partial<AiEvaluationFields> = {};

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();

    if (line.startsWith(FIT_PREFIX)) {
      fields.aiFitCategory = fitCategoryFromText(line.slice(FIT_PREFIX.length).trim());
      continue;
    }

    for (const [prefix, field] of TEXT_PREFIXES) {
      if (line.startsWith(prefix)) {
        fields[field] = line.slice(prefix.length).trim();
        break;
      }
    }
  }

  return applyEvaluationDefaults(fields);
}

/**
 * Pull a 1-10 prospect score out of free text: "Prospect score: 8" first,
 * then "8/10". Values are clamped to the range.
 */
export function parseProspectScore(text: string | null | undefined): number | undefined {
  if (!text) {
    return undefined;
  }

  const match = /prospect\s*score\s*[:-]?\s*(\d{1,2})/i.exec(text) ?? /\b(\d{1,2})\s*\/\s*10\b/.exec(text);
  if (!match) {
    return undefined;
  }

  return Math.max(1, Math.min(Number(match[1]), 10));
}
