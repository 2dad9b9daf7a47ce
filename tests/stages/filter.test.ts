import { describe, it, expect } from 'vitest';
import { FilterStage } from '../../src/stages/filter';
import { RunContext } from '../../src/state/run-context';
import { business, testConfig } from '../helpers/config';

describe('FilterStage', () => {
  it('drops noise using the configured lists and counts exclusions', async () => {
    const records = [
      business({ placeId: 'keep', name: 'Acme Medical Devices' }),
      business({ placeId: 'food', name: 'Northside Eats', categoryTags: ['restaurant', 'establishment'] }),
      business({ placeId: 'name', name: 'Downtown Coffee Shop' }),
      business({ placeId: 'few', name: 'Quiet Labs', reviewCount: 1 }),
    ];

    const result = await new FilterStage(testConfig()).runStage(records, new RunContext());

    expect(result.records.map((r) => r.placeId)).toEqual(['keep']);
    expect(result.processed).toBe(4);
    expect(result.passed).toBe(1);
    expect(result.failed).toBe(3);
  });
});
