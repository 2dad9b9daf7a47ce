import { describe, it, expect } from 'vitest';
import { WebsiteStage } from '../../src/stages/website';
import { RunContext } from '../../src/state/run-context';
import { FakePageFetcher, FakePlacesClient } from '../helpers/fakes';
import { business, testConfig } from '../helpers/config';

describe('WebsiteStage', () => {
  const places = () =>
    new FakePlacesClient(
      {},
      {
        nodetails: null,
        nosite: { website: null, phone: '555-0101', types: [] },
        deadsite: { website: 'https://dead.test', phone: null, types: [] },
        thinsite: { website: 'https://thin.test', phone: null, types: [] },
        good: { website: 'https://good.test', phone: '555-0100', types: ['establishment'] },
        broken: new Error('socket hang up'),
      }
    );

  const fetcher = () =>
    new FakePageFetcher({
      'https://thin.test': '<p>Coming soon</p>',
      'https://good.test': '<h2>Our Services</h2>',
    });

  it('keeps only businesses with a reachable business-focused site', async () => {
    const records = [
      business({ placeId: '', name: 'No Id' }),
      business({ placeId: 'nodetails' }),
      business({ placeId: 'nosite' }),
      business({ placeId: 'deadsite' }),
      business({ placeId: 'thinsite' }),
      business({ placeId: 'good' }),
      business({ placeId: 'broken', name: 'Broken Co' }),
    ];

    const result = await new WebsiteStage(testConfig(), places(), fetcher()).runStage(records, new RunContext());

    expect(result.success).toBe(true);
    expect(result.records.map((r) => r.placeId)).toEqual(['good']);
    expect(result.records[0]).toMatchObject({
      website: 'https://good.test',
      phone: '555-0100',
      websiteValid: true,
    });
    expect(result.passed).toBe(1);
    expect(result.failed).toBe(6);
    expect(result.errors).toEqual(['Broken Co: socket hang up']);
  });

  it('does not look up records without a place id', async () => {
    const client = places();
    await new WebsiteStage(testConfig(), client, fetcher()).runStage([business({ placeId: '' })], new RunContext());
    expect(client.lookups).toEqual([]);
  });

  it('validates a site by fetching it and looking for business indicators', async () => {
    const stage = new WebsiteStage(testConfig(), places(), fetcher());
    expect(await stage.validateWebsite('https://good.test')).toBe(true);
    expect(await stage.validateWebsite('https://thin.test')).toBe(false);
    expect(await stage.validateWebsite('https://dead.test')).toBe(false);
  });
});
