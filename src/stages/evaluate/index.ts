/**
 * EVALUATE Stage
 * Goal: Attach a structured language model assessment to every business
 *
 * Best effort: a failed evaluation keeps the record with "Unknown" fields, so
 * enrichment never lowers the number of records that continue.
 */

import { BaseStage } from '../base-stage';
import type { AiEvaluationFields, BusinessRecord } from '../../state/types';
import type { ProspectorConfig } from '../../config/types';
import type { LlmClient, PageFetcher } from '../../clients/types';
import { applyEvaluationDefaults, parseEvaluation, parseProspectScore } from '../../icp/evaluation-parser';
import { buildEvaluationPrompt, EVALUATION_SYSTEM_ROLE } from '../../prompts';
import { logger } from '../../lib/logger';
import { errorMessage } from '../../lib/errors';
import { excerpt, sleep } from '../../lib/utils';

export const FAILED_EVALUATION: Readonly<AiEvaluationFields> = {
  aiFitCategory: 'Unknown',
  aiReasoning: 'Evaluation failed',
  aiPeopleAssessment: 'Not available',
  aiRevenueAssessment: 'Unknown',
};

export class EvaluateStage extends BaseStage {
  private readonly llm: LlmClient;
  private readonly fetcher: PageFetcher;

  constructor(config: ProspectorConfig, llm: LlmClient, fetcher: PageFetcher) {
    super('evaluate', config);
    this.llm = llm;
    this.fetcher = fetcher;
  }

  protected async execute(records: BusinessRecord[]): Promise<BusinessRecord[]> {
    const { evaluationCap, evaluationDelay } = this.config.ai;
    const cap = evaluationCap ?? records.length;

    for (const [index, record] of records.entries()) {
      if (index >= cap) {
        logger.debug(`Evaluation cap reached, passing ${record.name} through unevaluated`);
        continue;
      }

      this.processed++;

      try {
        await this.evaluate(record);
        this.passed++;
        logger.info(`${record.name}: ${record.aiFitCategory} fit, ${record.aiRevenueAssessment} revenue`);
        await sleep(evaluationDelay);
      } catch (error) {
        this.failed++;
        this.recordError(error, record.name);
        Object.assign(record, FAILED_EVALUATION, { aiEvaluationText: `Error: ${errorMessage(error)}` });
      }
    }

    logger.info(`AI Evaluation complete: ${this.processed} companies evaluated`, { failed: this.failed });
    return records;
  }

  private async evaluate(record: BusinessRecord): Promise<void> {
    const { referenceProfile, evaluationMaxTokens } = this.config.ai;

    const siteExcerpt = record.website ? await this.fetchSiteExcerpt(record.website) : null;
    const text = await this.llm.complete({
      prompt: buildEvaluationPrompt(record, referenceProfile, siteExcerpt),
      systemRole: EVALUATION_SYSTEM_ROLE,
      maxTokens: evaluationMaxTokens,
    });

    record.aiEvaluationText = text;
    Object.assign(record, applyEvaluationDefaults(parseEvaluation(text)));

    const prospectScore = parseProspectScore(text);
    if (prospectScore !== undefined) {
      record.aiProspectScore = prospectScore;
    }
  }

  private async fetchSiteExcerpt(url: string): Promise<string | null> {
    const { siteFetchTimeout, siteExcerptMaxChars } = this.config.ai;
    const html = await this.fetcher.fetchText(url, siteFetchTimeout);
    return html === null ? null : excerpt(html, siteExcerptMaxChars);
  }
}

export { EvaluateStage as default };
