/**
 * Interfaces of the external collaborators the pipeline calls
 */

// One result of a nearby search, before it becomes a BusinessRecord
export interface PlaceResult {
  placeId: string;
  name: string;
  vicinity: string;
  types: string[];
  rating: number | null;
  userRatingsTotal: number | null;
  priceLevel: number | null;
  businessStatus: string | null;
}

export interface PlaceDetails {
  website: string | null;
  phone: string | null;
  types: string[];
}

export interface PlacesClient {
  // Empty on geocoding failure or a non-OK search; never throws
  discover(locationQuery: string, keyword: string, radius: number): Promise<PlaceResult[]>;
  // null when the API reports no result; throws CollaboratorError on transport failure
  lookupDetails(placeId: string): Promise<PlaceDetails | null>;
}

export interface CompletionRequest {
  prompt: string;
  systemRole: string;
  maxTokens: number;
}

export interface LlmClient {
  complete(request: CompletionRequest): Promise<string>;
}

export interface PageFetcher {
  // Body of an HTTP 200 response; null for any other status, timeout or network error
  fetchText(url: string, timeoutMs: number): Promise<string | null>;
}
