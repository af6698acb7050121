import { CarrierError, HttpError, isRecord } from '@spedisci/core';

/**
 * Coarse classification of a per-parcel rejection message
 */
export type GLSRejectionCode = 'DUPLICATE_REFERENCE' | 'INVALID_CONTRACT' | 'INVALID_FIELD' | 'OTHER';

export function classifyRejection(message: string): GLSRejectionCode {
  if (/\bbda\b/i.test(message) && /(esist|present|duplicat|già)/i.test(message)) return 'DUPLICATE_REFERENCE';
  if (/contratt/i.test(message)) return 'INVALID_CONTRACT';
  return 'OTHER';
}

/**
 * Error text returned in place of a parcel list, e.g. "Password errata"
 */
export function serviceMessageError(message: string, raw?: unknown): CarrierError {
  const text = message.trim() || 'Empty answer';
  if (/(password|credenzial|autenticaz|non autorizzat|non abilitat)/i.test(text)) {
    return new CarrierError(`GLS Italy rejected the credentials: ${text}`, 'Auth', { carrierCode: 'SERVICE_AUTH', raw });
  }
  if (/(temporaneamente|riprovare|timeout)/i.test(text)) {
    return new CarrierError(`GLS Italy temporarily unavailable: ${text}`, 'Transient', { carrierCode: 'SERVICE_BUSY', raw });
  }
  return new CarrierError(`GLS Italy error: ${text}`, 'Permanent', { carrierCode: 'SERVICE_ERROR', raw });
}

function retryAfterMs(headers: Record<string, string | string[]> | undefined): number | undefined {
  const value = headers?.['retry-after'];
  const seconds = Number(Array.isArray(value) ? value[0] : value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds * 1000 : undefined;
}

/**
 * Translate a transport failure into a CarrierError
 *
 * - 400: Validation
 * - 401/403: Auth
 * - 429: RateLimit (Retry-After honored)
 * - 5xx, timeouts, network errors: Transient
 * - anything else: Permanent
 */
export function translateGLSError(error: unknown): CarrierError {
  if (error instanceof CarrierError) return error;

  if (error instanceof HttpError) {
    const status = error.status ?? error.response?.status;
    const raw = error.response?.data;
    const meta = { carrierCode: status !== undefined ? `HTTP_${status}` : error.code, raw };

    if (status === 400) return new CarrierError(`GLS Italy rejected the request: ${error.message}`, 'Validation', meta);
    if (status === 401 || status === 403) return new CarrierError('GLS Italy credentials invalid', 'Auth', meta);
    if (status === 429) {
      const wait = retryAfterMs(error.response?.headers);
      return new CarrierError('GLS Italy rate limit exceeded', 'RateLimit', {
        ...meta,
        ...(wait !== undefined && { retryAfterMs: wait }),
      });
    }
    if (status !== undefined && status >= 500) return new CarrierError('GLS Italy server error', 'Transient', meta);
    if (status === undefined) return new CarrierError(`GLS Italy connection error: ${error.message}`, 'Transient', meta);
    return new CarrierError(`GLS Italy error: ${error.message}`, 'Permanent', meta);
  }

  if (error instanceof Error) {
    return new CarrierError(`GLS Italy connection error: ${error.message}`, 'Transient', { raw: error.message });
  }

  return new CarrierError('Unknown GLS Italy error', 'Permanent', { raw: isRecord(error) ? error : String(error) });
}
