/**
 * Run context - state owned by a single pipeline run
 * Holds the discovery dedup set and per-stage summaries; never shared between runs
 */

import * as crypto from 'crypto';
import type { StageSummary } from './types';

export class RunContext {
  readonly runId: string;
  readonly startedAt: number;
  readonly seenPlaceIds = new Set<string>();
  private readonly summaries: StageSummary[] = [];

  constructor(runId: string = crypto.randomUUID()) {
    this.runId = runId;
    this.startedAt = Date.now();
  }

  // Returns true the first time an identifier is seen in this run
  markSeen(placeId: string): boolean {
    if (this.seenPlaceIds.has(placeId)) {
      return false;
    }
    this.seenPlaceIds.add(placeId);
    return true;
  }

  record(summary: StageSummary): void {
    this.summaries.push(summary);
  }

  getSummaries(): StageSummary[] {
    return [...this.summaries];
  }
}
