import { afterEach, describe, it, expect, vi } from 'vitest';
import { GooglePlacesClient } from '../../src/clients/google-places';
import { CollaboratorError } from '../../src/lib/errors';

type Routes = Record<string, unknown>;

// Answers each Places endpoint with a canned body, keyed by path suffix
function stubFetch(routes: Routes) {
  const calls: URL[] = [];
  const fetchMock = vi.fn(async (input: string | URL) => {
    const url = new URL(String(input));
    calls.push(url);
    const route = Object.keys(routes).find((suffix) => url.pathname.endsWith(suffix));
    if (!route) {
      return new Response('not found', { status: 404 });
    }
    return new Response(JSON.stringify(routes[route]), { status: 200 });
  });
  vi.stubGlobal('fetch', fetchMock);
  return calls;
}

const client = () =>
  new GooglePlacesClient({ apiKey: 'test-key', baseUrl: 'https://places.test/maps/api', timeout: 1000 });

const GEOCODE_OK = { status: 'OK', results: [{ geometry: { location: { lat: 40.7, lng: -74 } } }] };

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('GooglePlacesClient.discover', () => {
  it('geocodes the city and maps nearby results', async () => {
    const calls = stubFetch({
      '/geocode/json': GEOCODE_OK,
      '/place/nearbysearch/json': {
        status: 'OK',
        results: [
          {
            place_id: 'p1',
            name: 'Acme Medical Devices',
            vicinity: '1 Main St, New York, NY',
            types: ['establishment'],
            rating: 4.2,
            user_ratings_total: 50,
          },
          { name: 'No identifier' },
        ],
      },
    });

    const places = await client().discover('New York, NY', 'medical device', 50000);

    expect(places).toEqual([
      {
        placeId: 'p1',
        name: 'Acme Medical Devices',
        vicinity: '1 Main St, New York, NY',
        types: ['establishment'],
        rating: 4.2,
        userRatingsTotal: 50,
        priceLevel: null,
        businessStatus: null,
      },
    ]);

    const search = calls[1];
    expect(search.searchParams.get('location')).toBe('40.7,-74');
    expect(search.searchParams.get('radius')).toBe('50000');
    expect(search.searchParams.get('type')).toBe('establishment');
    expect(search.searchParams.get('keyword')).toBe('medical device');
    expect(search.searchParams.get('key')).toBe('test-key');
  });

  it('returns nothing when the city cannot be geocoded', async () => {
    const calls = stubFetch({ '/geocode/json': { status: 'ZERO_RESULTS', results: [] } });

    expect(await client().discover('Nowhere', 'medical device', 50000)).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it('returns nothing for a non-OK search status', async () => {
    stubFetch({
      '/geocode/json': GEOCODE_OK,
      '/place/nearbysearch/json': { status: 'OVER_QUERY_LIMIT' },
    });

    expect(await client().discover('New York, NY', 'medical device', 50000)).toEqual([]);
  });
});

describe('GooglePlacesClient.lookupDetails', () => {
  it('returns website and phone', async () => {
    const calls = stubFetch({
      '/place/details/json': {
        status: 'OK',
        result: { website: 'https://acme.test', formatted_phone_number: '(555) 010-0100', types: ['establishment'] },
      },
    });

    expect(await client().lookupDetails('p1')).toEqual({
      website: 'https://acme.test',
      phone: '(555) 010-0100',
      types: ['establishment'],
    });
    expect(calls[0].searchParams.get('fields')).toBe('website,formatted_phone_number,types');
  });

  it('returns null when the place is not found', async () => {
    stubFetch({ '/place/details/json': { status: 'NOT_FOUND' } });
    expect(await client().lookupDetails('missing')).toBeNull();
  });

  it('throws a collaborator error on an HTTP failure', async () => {
    stubFetch({});
    await expect(client().lookupDetails('p1')).rejects.toBeInstanceOf(CollaboratorError);
  });
});
