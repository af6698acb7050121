/**
 * Google Geocoding adapter
 *
 * Resolves Italian addresses through the Geocoding API and scores the best
 * result by its geometry precision.
 */

import type { AdapterContext, GeocodeCandidate, GeocodeRequest, GeocodingAdapter } from '@spedisci/core';
import { GeocodingError } from '@spedisci/core';
import { geocode as geocodeImpl, type GoogleGeocodingConfig } from './capabilities/geocode.js';
import { GoogleGeocodingOptionsSchema } from './validation/index.js';

export const GOOGLE_GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json';

export interface GoogleGeocodingOptions {
  apiKey: string;
  baseUrl?: string;
  /** Language of returned names, default "it" */
  language?: string;
  /** Region bias, default "it" */
  region?: string;
}

export class GoogleGeocodingAdapter implements GeocodingAdapter {
  readonly id = 'google-geocoding';

  private readonly config: GoogleGeocodingConfig;

  constructor(opts: GoogleGeocodingOptions) {
    const validated = GoogleGeocodingOptionsSchema.safeParse(opts);
    if (!validated.success) {
      throw new GeocodingError(`Invalid Google geocoding options: ${validated.error.issues[0]?.message ?? 'unknown'}`, 'Validation');
    }
    this.config = {
      apiKey: validated.data.apiKey,
      baseUrl: validated.data.baseUrl ?? GOOGLE_GEOCODE_URL,
      language: validated.data.language ?? 'it',
      region: validated.data.region ?? 'it',
    };
  }

  geocode(req: GeocodeRequest, ctx: AdapterContext): Promise<GeocodeCandidate> {
    return geocodeImpl(req, ctx, this.config);
  }
}

export { formatQuery } from './capabilities/geocode.js';
export { mapGeocodeResponse, PRECISION_CONFIDENCE, PARTIAL_MATCH_FACTOR } from './mappers/candidate.js';
export { translateGoogleError } from './utils/errors.js';
export { GeocodeResponseSchema, safeValidateGeocodeResponse } from './validation/index.js';
export type { GoogleGeocodeResponse, GoogleGeocodeResult, GoogleAddressComponent } from './validation/index.js';
