import type { AdapterContext } from './adapter-context.js';

export interface GeocodeRequest {
  address: string;
  postalCode: string;
  city: string;
  province: string;

  /** ISO 3166-1 alpha-2, default "IT" */
  country?: string;
}

export type LocationPrecision = "ROOFTOP" | "RANGE_INTERPOLATED" | "GEOMETRIC_CENTER" | "APPROXIMATE";

/**
 * Best candidate returned by the geocoding provider.
 * "No results" is a candidate with status ZERO_RESULTS, not an error.
 */
export interface GeocodeCandidate {
  status: "OK" | "ZERO_RESULTS";
  route?: string;
  streetNumber?: string;

  /** Municipality of the candidate */
  locality?: string;

  /** Province code as returned by the provider, e.g. "MI" */
  province?: string;

  postalCode?: string;
  precision?: LocationPrecision;

  /** Provider confidence in [0, 1] */
  confidence: number;

  /** The provider matched only part of the query or returned competing results */
  ambiguous: boolean;

  resultCount: number;
  formattedAddress?: string;
  raw?: unknown;
}

/**
 * GeocodingAdapter
 * Throws GeocodingError when the provider cannot answer.
 */
export interface GeocodingAdapter {
  readonly id: string;

  geocode(req: GeocodeRequest, ctx: AdapterContext): Promise<GeocodeCandidate>;
}
