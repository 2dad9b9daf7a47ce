import { describe, it, expect } from 'vitest';
import { RunContext } from '../../src/state/run-context';
import { FilterStage } from '../../src/stages/filter';
import { business, testConfig } from '../helpers/config';

describe('RunContext', () => {
  it('reports an identifier as new only once', () => {
    const run = new RunContext('run-1');
    expect(run.markSeen('p1')).toBe(true);
    expect(run.markSeen('p1')).toBe(false);
    expect(run.markSeen('p2')).toBe(true);
  });

  it('collects a summary from each stage that runs', async () => {
    const run = new RunContext();
    await new FilterStage(testConfig()).runStage([business(), business({ reviewCount: 0 })], run);

    const [summary] = run.getSummaries();
    expect(summary).toMatchObject({ stage: 'filter', success: true, processed: 2, passed: 1, failed: 1 });
  });
});
