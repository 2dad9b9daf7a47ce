/**
 * Pipeline command - run the refined flow
 */

import { loadConfig, requireApiKey } from '../../config';
import type { OutputFormat, ProspectorConfig } from '../../config/types';
import { GooglePlacesClient } from '../../clients/google-places';
import { OpenAiClient } from '../../clients/openai';
import { HttpPageFetcher } from '../../clients/page-fetcher';
import { runRefinedPipeline, type PipelineDeps, type PipelineResult } from '../../pipeline';
import { logger } from '../../lib/logger';

export interface PipelineCommandOptions {
  config?: string;
  skipPrecheck?: boolean;
  skipEvaluation?: boolean;
  website?: boolean;
  limit?: number;
  format?: OutputFormat;
  prefix?: string;
}

// The OpenAI key is only required when a model stage will run
export function buildDeps(config: ProspectorConfig, needsLlm: boolean): PipelineDeps {
  return {
    config,
    places: new GooglePlacesClient({
      apiKey: requireApiKey(config, 'googlePlaces'),
      baseUrl: config.api.placesBaseUrl,
      timeout: config.api.requestTimeout,
    }),
    llm: needsLlm
      ? new OpenAiClient({
          apiKey: requireApiKey(config, 'openai'),
          model: config.api.model,
          timeout: config.api.requestTimeout,
        })
      : undefined,
    fetcher: new HttpPageFetcher(),
  };
}

export function reportResult(result: PipelineResult): void {
  if (result.starvedAt) {
    logger.warn(`Run ${result.runId} produced no leads (stopped after ${result.starvedAt})`);
    return;
  }

  logger.info(`Run ${result.runId} exported ${result.records.length} leads`);
  for (const file of result.outputFiles) {
    console.log(file);
  }
}

export async function runPipeline(options: PipelineCommandOptions): Promise<PipelineResult> {
  const config = loadConfig(options.config);
  logger.info('Starting refined pipeline run', { options });

  const needsLlm = !(options.skipPrecheck && options.skipEvaluation);
  const result = await runRefinedPipeline(buildDeps(config, needsLlm), {
    skipPrecheck: options.skipPrecheck,
    skipEvaluation: options.skipEvaluation,
    // commander sets website=false for --no-website
    skipWebsite: options.website === false,
    limit: options.limit,
    format: options.format,
    filenamePrefix: options.prefix,
  });

  reportResult(result);
  return result;
}
