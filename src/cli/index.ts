#!/usr/bin/env node
/**
 * ICP Prospector CLI
 * Entry point for running the lead generation flows
 */

import { Command, InvalidArgumentError } from 'commander';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import type { OutputFormat } from '../config/types';
import { runPipeline } from './commands/pipeline';
import { runComprehensive } from './commands/comprehensive';
import { initConfig, showConfig } from './commands/config';

function parseLimit(value: string): number {
  const limit = parseInt(value, 10);
  if (Number.isNaN(limit) || limit < 1) {
    throw new InvalidArgumentError('Limit must be a positive integer.');
  }
  return limit;
}

function parseFormat(value: string): OutputFormat {
  if (value === 'csv' || value === 'json' || value === 'xlsx' || value === 'both' || value === 'all') {
    return value;
  }
  throw new InvalidArgumentError('Format must be one of: csv, json, xlsx, both, all.');
}

function fail(label: string, error: unknown): never {
  logger.error(`${label} failed`, { error: errorMessage(error) });
  process.exit(1);
}

const program = new Command();

program
  .name('icp-prospector')
  .description('Discover, qualify and rank B2B prospects against an ideal customer profile')
  .version('1.0.0')
  .option('-v, --verbose', 'Log debug output, including per-record exclusions');

program.hook('preAction', () => {
  if (program.opts().verbose) {
    logger.setLevel('debug');
  }
});

// Refined flow
program
  .command('pipeline')
  .description('Run the refined flow: discover → filter → pre-check → evaluate → website → score → output')
  .option('-c, --config <path>', 'Path to a YAML or JSON config file')
  .option('--skip-precheck', 'Skip the language model pre-check')
  .option('--skip-evaluation', 'Skip the language model evaluation')
  .option('--no-website', 'Skip the website requirement gate')
  .option('-l, --limit <number>', 'Maximum businesses to discover', parseLimit)
  .option('-f, --format <format>', 'Output format (csv, json, xlsx, both, all)', parseFormat)
  .option('-p, --prefix <prefix>', 'Output filename prefix')
  .action(async (options) => {
    try {
      await runPipeline(options);
    } catch (error) {
      fail('Pipeline', error);
    }
  });

// Comprehensive flow
program
  .command('comprehensive')
  .description('Search every configured city and keyword, then gate by ICP score')
  .option('-c, --config <path>', 'Path to a YAML or JSON config file')
  .option('--skip-evaluation', 'Skip the language model evaluation')
  .option('-l, --limit <number>', 'Maximum businesses to discover', parseLimit)
  .option('-f, --format <format>', 'Output format (csv, json, xlsx, both, all)', parseFormat)
  .option('-p, --prefix <prefix>', 'Output filename prefix')
  .action(async (options) => {
    try {
      await runComprehensive(options);
    } catch (error) {
      fail('Comprehensive run', error);
    }
  });

// Config command
program
  .command('config')
  .description('Show current configuration with API keys masked')
  .option('-c, --config <path>', 'Path to a YAML or JSON config file')
  .action((options) => {
    try {
      showConfig(options);
    } catch (error) {
      fail('Config', error);
    }
  });

// Write defaults
program
  .command('init-config')
  .description('Write the default configuration to disk')
  .option('-c, --config <path>', 'Destination path')
  .action((options) => {
    try {
      const target = initConfig(options);
      console.log(target);
    } catch (error) {
      fail('Init config', error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => fail('CLI', error));
