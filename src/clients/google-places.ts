/**
 * Google Places client
 * Geocodes a city, runs a nearby search around it, and looks up place details
 */

import { z } from 'zod';
import type { PlaceDetails, PlaceResult, PlacesClient } from './types';
import { logger } from '../lib/logger';
import { CollaboratorError, errorMessage } from '../lib/errors';

const GeocodeResponseSchema = z.object({
  status: z.string(),
  results: z
    .array(
      z.object({
        geometry: z.object({
          location: z.object({ lat: z.number(), lng: z.number() }),
        }),
      })
    )
    .default([]),
});

const NearbyPlaceSchema = z.object({
  place_id: z.string(),
  name: z.string().default(''),
  vicinity: z.string().default(''),
  types: z.array(z.string()).default([]),
  rating: z.number().nullish(),
  user_ratings_total: z.number().nullish(),
  price_level: z.number().nullish(),
  business_status: z.string().nullish(),
});

const NearbySearchResponseSchema = z.object({
  status: z.string(),
  results: z.array(z.unknown()).default([]),
});

const DetailsResponseSchema = z.object({
  status: z.string(),
  result: z
    .object({
      website: z.string().nullish(),
      formatted_phone_number: z.string().nullish(),
      types: z.array(z.string()).default([]),
    })
    .optional(),
});

export interface GooglePlacesClientOptions {
  apiKey: string;
  baseUrl: string;
  timeout: number;
}

export class GooglePlacesClient implements PlacesClient {
  constructor(private readonly options: GooglePlacesClientOptions) {}

  private async getJson(endpoint: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.options.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('key', this.options.apiKey);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeout);

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new CollaboratorError(`Places API ${endpoint} returned HTTP ${response.status}`, 'places', response.status);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof CollaboratorError) throw error;
      throw new CollaboratorError(`Places API ${endpoint} failed: ${errorMessage(error)}`, 'places');
    } finally {
      clearTimeout(timeout);
    }
  }

  async geocode(locationQuery: string): Promise<{ lat: number; lng: number } | null> {
    try {
      const data = GeocodeResponseSchema.parse(await this.getJson('geocode/json', { address: locationQuery }));
      const first = data.results[0];
      if (data.status !== 'OK' || !first) {
        logger.warn(`Could not get coordinates for ${locationQuery}`, { status: data.status });
        return null;
      }
      return first.geometry.location;
    } catch (error) {
      logger.warn(`Error getting coordinates for ${locationQuery}`, { error: errorMessage(error) });
      return null;
    }
  }

  async discover(locationQuery: string, keyword: string, radius: number): Promise<PlaceResult[]> {
    const location = await this.geocode(locationQuery);
    if (!location) {
      return [];
    }

    try {
      const data = NearbySearchResponseSchema.parse(
        await this.getJson('place/nearbysearch/json', {
          location: `${location.lat},${location.lng}`,
          radius: String(radius),
          type: 'establishment',
          keyword,
        })
      );

      if (data.status !== 'OK') {
        // ZERO_RESULTS lands here too
        logger.warn(`Error searching ${locationQuery} with keyword '${keyword}'`, { status: data.status });
        return [];
      }

      const places: PlaceResult[] = [];
      for (const raw of data.results) {
        const parsed = NearbyPlaceSchema.safeParse(raw);
        if (!parsed.success) {
          logger.debug('Skipping malformed place result', { error: parsed.error.message });
          continue;
        }
        const place = parsed.data;
        places.push({
          placeId: place.place_id,
          name: place.name,
          vicinity: place.vicinity,
          types: place.types,
          rating: place.rating ?? null,
          userRatingsTotal: place.user_ratings_total ?? null,
          priceLevel: place.price_level ?? null,
          businessStatus: place.business_status ?? null,
        });
      }
      return places;
    } catch (error) {
      logger.warn(`Error searching ${locationQuery} with keyword '${keyword}'`, { error: errorMessage(error) });
      return [];
    }
  }

  async lookupDetails(placeId: string): Promise<PlaceDetails | null> {
    const parsed = DetailsResponseSchema.safeParse(
      await this.getJson('place/details/json', {
        place_id: placeId,
        fields: 'website,formatted_phone_number,types',
      })
    );

    if (!parsed.success) {
      throw new CollaboratorError(`Malformed place details for ${placeId}`, 'places');
    }
    if (parsed.data.status !== 'OK' || !parsed.data.result) {
      logger.debug(`Place details unavailable for ${placeId}`, { status: parsed.data.status });
      return null;
    }

    const result = parsed.data.result;
    return {
      website: result.website ?? null,
      phone: result.formatted_phone_number ?? null,
      types: result.types,
    };
  }
}
