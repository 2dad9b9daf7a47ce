/**
 * Comprehensive command - search every city and keyword, then gate by ICP score
 */

import { loadConfig } from '../../config';
import type { OutputFormat } from '../../config/types';
import { runComprehensivePipeline, type PipelineResult } from '../../pipeline';
import { logger } from '../../lib/logger';
import { buildDeps, reportResult } from './pipeline';

export interface ComprehensiveCommandOptions {
  config?: string;
  skipEvaluation?: boolean;
  limit?: number;
  format?: OutputFormat;
  prefix?: string;
}

export async function runComprehensive(options: ComprehensiveCommandOptions): Promise<PipelineResult> {
  const config = loadConfig(options.config);
  logger.info('Starting comprehensive run', { options });

  const result = await runComprehensivePipeline(buildDeps(config, !options.skipEvaluation), {
    skipEvaluation: options.skipEvaluation,
    limit: options.limit,
    format: options.format,
    filenamePrefix: options.prefix,
  });

  reportResult(result);
  return result;
}
