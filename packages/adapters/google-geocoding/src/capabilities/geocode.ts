/**
 * Google Geocoding: one lookup per address
 */

import type { AdapterContext, GeocodeCandidate, GeocodeRequest, HttpClientConfig } from '@spedisci/core';
import { errorToLog, GeocodingError, safeLog, serializeForLog } from '@spedisci/core';
import { mapGeocodeResponse } from '../mappers/candidate.js';
import { statusError, translateGoogleError } from '../utils/errors.js';
import { safeValidateGeocodeResponse } from '../validation/index.js';

export interface GoogleGeocodingConfig {
  apiKey: string;
  baseUrl: string;
  language: string;
  region: string;
}

/**
 * One-line query, e.g. "Via Roma 12, 20121 Milano MI"
 */
export function formatQuery(req: GeocodeRequest): string {
  const place = [req.postalCode, req.city, req.province].map((part) => part.trim()).filter(Boolean).join(' ');
  return [req.address.trim(), place].filter(Boolean).join(', ');
}

export async function geocode(
  req: GeocodeRequest,
  ctx: AdapterContext,
  config: GoogleGeocodingConfig,
): Promise<GeocodeCandidate> {
  try {
    if (!ctx.http) {
      throw new GeocodingError('HTTP client not provided in context', 'Permanent');
    }

    const query = formatQuery(req);
    const httpConfig: HttpClientConfig = {
      params: {
        address: query,
        components: `country:${req.country ?? 'IT'}`,
        language: config.language,
        region: config.region,
        key: config.apiKey,
      },
      ...(ctx.timeoutMs !== undefined && { timeout: ctx.timeoutMs }),
      ...(ctx.signal && { signal: ctx.signal }),
    };

    safeLog(ctx.logger, 'debug', 'Google geocoding: Looking up address', { query }, ctx);

    const httpResponse = await ctx.http.get<unknown>(config.baseUrl, httpConfig);

    const validated = safeValidateGeocodeResponse(httpResponse.body);
    if (!validated.success) {
      throw new GeocodingError('Unexpected Google geocoding response', 'Permanent', {
        raw: serializeForLog(httpResponse.body),
      });
    }

    const { status } = validated.data;
    if (status !== 'OK' && status !== 'ZERO_RESULTS') {
      throw statusError(status, validated.data.error_message);
    }

    const candidate = mapGeocodeResponse(validated.data);
    safeLog(ctx.logger, 'debug', 'Google geocoding: Candidate', {
      query,
      status: candidate.status,
      confidence: candidate.confidence,
      resultCount: candidate.resultCount,
    }, ctx);

    return { ...candidate, raw: validated.data };
  } catch (error) {
    safeLog(ctx.logger, 'error', 'Google geocoding: Lookup failed', {
      address: req.address,
      error: errorToLog(error),
    }, ctx, []);
    throw translateGoogleError(error);
  }
}
