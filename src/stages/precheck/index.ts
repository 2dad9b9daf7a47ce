/**
 * PRECHECK Stage
 * Goal: Keep only businesses the language model judges to have reliable information
 */

import { BaseStage } from '../base-stage';
import type { BusinessRecord } from '../../state/types';
import type { ProspectorConfig } from '../../config/types';
import type { LlmClient } from '../../clients/types';
import { buildPrecheckPrompt, PRECHECK_SYSTEM_ROLE } from '../../prompts';
import { logger } from '../../lib/logger';
import { sleep } from '../../lib/utils';

export function isAffirmative(reply: string): boolean {
  return reply.trim().toLowerCase().startsWith('yes');
}

export class PrecheckStage extends BaseStage {
  private readonly llm: LlmClient;

  constructor(config: ProspectorConfig, llm: LlmClient) {
    super('precheck', config);
    this.llm = llm;
  }

  protected async execute(records: BusinessRecord[]): Promise<BusinessRecord[]> {
    const { precheckCap, precheckMaxTokens, precheckDelay } = this.config.ai;
    const candidates = precheckCap ? records.slice(0, precheckCap) : records;
    const passed: BusinessRecord[] = [];

    // Records past the cap are never asked about and leave the funnel here
    for (const record of records.slice(candidates.length)) {
      this.processed++;
      this.failed++;
      logger.logExclusion(record.name, 'precheck_capped', { placeId: record.placeId, cap: precheckCap });
    }

    for (const record of candidates) {
      this.processed++;

      try {
        const reply = await this.llm.complete({
          prompt: buildPrecheckPrompt(record),
          systemRole: PRECHECK_SYSTEM_ROLE,
          maxTokens: precheckMaxTokens,
        });

        if (isAffirmative(reply)) {
          passed.push(record);
          this.passed++;
          logger.debug(`${record.name}: passed pre-check`);
        } else {
          this.failed++;
          logger.logExclusion(record.name, 'precheck_rejected', { reply: reply.trim() });
        }

        await sleep(precheckDelay);
      } catch (error) {
        // A failed call drops the record
        this.failed++;
        this.recordError(error, record.name);
      }
    }

    logger.info(`Pre-check results: ${passed.length}/${candidates.length} companies passed`);
    return passed;
  }
}

export { PrecheckStage as default };
