/**
 * Base stage class - all pipeline stages extend this
 * Provides common functionality for logging, run tracking, and error handling
 */

import type { BusinessRecord, StageName } from '../state/types';
import type { RunContext } from '../state/run-context';
import type { ProspectorConfig } from '../config/types';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';

export interface StageResult {
  success: boolean;
  records: BusinessRecord[];
  processed: number;
  passed: number;
  failed: number;
  errors: string[];
}

export abstract class BaseStage {
  protected readonly stageName: StageName;
  protected readonly config: ProspectorConfig;
  protected run: RunContext | null = null;
  protected processed = 0;
  protected passed = 0;
  protected failed = 0;
  protected errors: string[] = [];

  constructor(stageName: StageName, config: ProspectorConfig) {
    this.stageName = stageName;
    this.config = config;
  }

  // Template method - subclasses implement the actual logic
  protected abstract execute(records: BusinessRecord[]): Promise<BusinessRecord[]>;

  // Main entry point
  async runStage(records: BusinessRecord[], run: RunContext): Promise<StageResult> {
    this.run = run;
    this.processed = 0;
    this.passed = 0;
    this.failed = 0;
    this.errors = [];
    logger.setContext(this.stageName, run.runId);

    const startedAt = Date.now();

    try {
      logger.info(`Starting ${this.stageName} stage`, { input: records.length });

      const output = await this.execute(records);

      run.record({
        stage: this.stageName,
        success: true,
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
        startedAt,
        completedAt: Date.now(),
      });

      logger.info(`Completed ${this.stageName} stage`, {
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
      });

      return {
        success: true,
        records: output,
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
        errors: this.errors,
      };
    } catch (error) {
      const message = errorMessage(error);
      this.errors.push(message);

      run.record({
        stage: this.stageName,
        success: false,
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
        startedAt,
        completedAt: Date.now(),
      });

      logger.error(`Stage ${this.stageName} failed`, { error: message });

      return {
        success: false,
        records: [],
        processed: this.processed,
        passed: this.passed,
        failed: this.failed,
        errors: this.errors,
      };
    }
  }

  // Record a per-record error without failing the whole stage
  protected recordError(error: unknown, recordName?: string): void {
    const message = errorMessage(error);
    this.errors.push(recordName ? `${recordName}: ${message}` : message);
    logger.warn(`Stage error: ${message}`, recordName ? { record: recordName } : undefined);
  }

  // Get the current run ID
  protected getRunId(): string {
    return this.run?.runId || 'unknown';
  }
}
