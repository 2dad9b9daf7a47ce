/**
 * Pipeline flows
 * Strictly sequential; each stage consumes the previous stage's records.
 * A stage that leaves nothing (or fails) ends the run with an empty result.
 */

import type { BusinessRecord } from '../state/types';
import type { ProspectorConfig, OutputFormat } from '../config/types';
import type { LlmClient, PageFetcher, PlacesClient } from '../clients/types';
import { RunContext } from '../state/run-context';
import type { BaseStage } from '../stages/base-stage';
import { DiscoverStage } from '../stages/discover';
import { FilterStage } from '../stages/filter';
import { PrecheckStage } from '../stages/precheck';
import { EvaluateStage } from '../stages/evaluate';
import { WebsiteStage } from '../stages/website';
import { ScoreStage } from '../stages/score';
import { OutputStage } from '../stages/output';
import { aiTierOrdinal, fitTierOrdinal, rankRecords } from '../icp/rank';
import { logger } from '../lib/logger';
import { ConfigError } from '../lib/errors';

export interface PipelineDeps {
  config: ProspectorConfig;
  places: PlacesClient;
  // Only needed when a pre-check or evaluation runs
  llm?: LlmClient;
  fetcher: PageFetcher;
  now?: () => Date;
}

export interface PipelineOptions {
  skipPrecheck?: boolean;
  skipEvaluation?: boolean;
  skipWebsite?: boolean;
  limit?: number;
  format?: OutputFormat;
  filenamePrefix?: string;
}

export interface PipelineResult {
  runId: string;
  records: BusinessRecord[];
  outputFiles: string[];
  // Stage that left no records, when the run ended early
  starvedAt?: string;
}

class FunnelStarved extends Error {
  constructor(readonly stage: string) {
    super(`No companies left after ${stage} stage`);
    this.name = 'FunnelStarved';
  }
}

async function runStep(stage: BaseStage, label: string, records: BusinessRecord[], run: RunContext): Promise<BusinessRecord[]> {
  const result = await stage.runStage(records, run);
  if (!result.success || result.records.length === 0) {
    throw new FunnelStarved(label);
  }
  return result.records;
}

async function withStarvation(
  run: RunContext,
  flow: () => Promise<{ records: BusinessRecord[]; outputFiles: string[] }>
): Promise<PipelineResult> {
  try {
    const { records, outputFiles } = await flow();
    logger.info('Pipeline complete', { runId: run.runId, total: records.length, files: outputFiles });
    return { runId: run.runId, records, outputFiles };
  } catch (error) {
    if (error instanceof FunnelStarved) {
      logger.warn(error.message, { runId: run.runId });
      return { runId: run.runId, records: [], outputFiles: [], starvedAt: error.stage };
    }
    throw error;
  }
}

function requireLlm(deps: PipelineDeps): LlmClient {
  if (!deps.llm) {
    throw new ConfigError('A language model client is required for the pre-check and evaluation stages');
  }
  return deps.llm;
}

function logAverageProspectScore(records: BusinessRecord[]): void {
  const scored = records.filter((r) => r.aiProspectScore !== undefined);
  if (scored.length === 0) return;
  const average = scored.reduce((sum, r) => sum + (r.aiProspectScore ?? 0), 0) / scored.length;
  logger.info(`Average prospect score: ${average.toFixed(1)}`, { evaluated: scored.length });
}

/**
 * Refined flow: discover → noise filter → pre-check → evaluation → shortlist
 * → website gate → score and categorize → rank and export
 */
export async function runRefinedPipeline(deps: PipelineDeps, options: PipelineOptions = {}): Promise<PipelineResult> {
  const { config, places, fetcher } = deps;
  const llm = options.skipPrecheck && options.skipEvaluation ? undefined : requireLlm(deps);
  const run = new RunContext();

  logger.info('Starting refined pipeline', { runId: run.runId, options });

  return withStarvation(run, async () => {
    let records = await runStep(new DiscoverStage(config, places, 'optimized', options.limit), 'discover', [], run);
    records = await runStep(new FilterStage(config), 'filter', records, run);

    if (llm && !options.skipPrecheck) {
      records = await runStep(new PrecheckStage(config, llm), 'precheck', records, run);
    }

    if (llm && !options.skipEvaluation) {
      records = await runStep(new EvaluateStage(config, llm, fetcher), 'evaluate', records, run);
      logAverageProspectScore(records);
    }

    const skipWebsite = options.skipWebsite || !config.website.required;
    if (!skipWebsite) {
      const { shortlistSize, fallbackToShortlist } = config.website;
      const ranked = rankRecords(records, aiTierOrdinal);
      const shortlist = shortlistSize > 0 ? ranked.slice(0, shortlistSize) : ranked;

      const website = await new WebsiteStage(config, places, fetcher).runStage(shortlist, run);
      if (website.success && website.records.length > 0) {
        records = website.records;
      } else if (fallbackToShortlist) {
        logger.warn('No companies passed website validation, continuing with the unverified shortlist');
        records = shortlist;
      } else {
        throw new FunnelStarved('website');
      }
    }

    records = await runStep(new ScoreStage(config, 'websiteRequired'), 'score', records, run);

    const output = new OutputStage(config, {
      tierOf: fitTierOrdinal,
      format: options.format,
      filenamePrefix: options.filenamePrefix ?? `refined_${config.output.filenamePrefix}`,
      now: deps.now,
    });
    const result = await output.runStage(records, run);
    if (!result.success) {
      throw new Error(`Output failed: ${result.errors.join(', ')}`);
    }

    return { records: result.records, outputFiles: output.getOutputFiles() };
  });
}

/**
 * Comprehensive flow: discover every city × keyword → noise filter → legacy
 * ICP score gate → evaluation → rank and export
 */
export async function runComprehensivePipeline(
  deps: PipelineDeps,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { config, places, fetcher } = deps;
  const llm = options.skipEvaluation ? undefined : requireLlm(deps);
  const run = new RunContext();

  logger.info('Starting comprehensive pipeline', { runId: run.runId, options });

  return withStarvation(run, async () => {
    let records = await runStep(new DiscoverStage(config, places, 'comprehensive', options.limit), 'discover', [], run);
    records = await runStep(new FilterStage(config), 'filter', records, run);
    records = await runStep(new ScoreStage(config, 'legacy'), 'score', records, run);

    if (llm) {
      records = await runStep(new EvaluateStage(config, llm, fetcher), 'evaluate', records, run);
      logAverageProspectScore(records);
    }

    const output = new OutputStage(config, {
      tierOf: aiTierOrdinal,
      format: options.format,
      filenamePrefix: options.filenamePrefix,
      now: deps.now,
    });
    const result = await output.runStage(records, run);
    if (!result.success) {
      throw new Error(`Output failed: ${result.errors.join(', ')}`);
    }

    return { records: result.records, outputFiles: output.getOutputFiles() };
  });
}
