import type { ErrorCategory } from '@spedisci/core';
import { GeocodingError, HttpError } from '@spedisci/core';

const STATUS_CATEGORIES: Record<string, ErrorCategory> = {
  OVER_QUERY_LIMIT: 'RateLimit',
  OVER_DAILY_LIMIT: 'RateLimit',
  REQUEST_DENIED: 'Auth',
  INVALID_REQUEST: 'Validation',
  UNKNOWN_ERROR: 'Transient',
};

/**
 * Error for an answer whose status is neither OK nor ZERO_RESULTS
 */
export function statusError(status: string, errorMessage?: string): GeocodingError {
  const category = STATUS_CATEGORIES[status] ?? 'Permanent';
  const detail = errorMessage ? `: ${errorMessage}` : '';
  return new GeocodingError(`Google geocoding answered ${status}${detail}`, category, { providerStatus: status });
}

/**
 * Translate a transport failure into a GeocodingError
 * Same status mapping as the carrier adapters.
 */
export function translateGoogleError(error: unknown): GeocodingError {
  if (error instanceof GeocodingError) return error;

  if (error instanceof HttpError) {
    const status = error.status ?? error.response?.status;
    const raw = error.response?.data;
    const providerStatus = status !== undefined ? `HTTP_${status}` : error.code;
    const opts = { raw, ...(providerStatus !== undefined && { providerStatus }) };

    if (status === undefined) return new GeocodingError(`Google geocoding unreachable: ${error.message}`, 'Transient', opts);
    if (status === 400) return new GeocodingError('Google geocoding rejected the request', 'Validation', opts);
    if (status === 401 || status === 403) return new GeocodingError('Google geocoding denied the request', 'Auth', opts);
    if (status === 429) return new GeocodingError('Google geocoding rate limit exceeded', 'RateLimit', opts);
    if (status >= 500) return new GeocodingError('Google geocoding server error', 'Transient', opts);
    return new GeocodingError(`Google geocoding error: ${error.message}`, 'Permanent', opts);
  }

  if (error instanceof Error) {
    return new GeocodingError(`Google geocoding unreachable: ${error.message}`, 'Transient');
  }
  return new GeocodingError('Unknown Google geocoding error', 'Permanent', { raw: String(error) });
}
