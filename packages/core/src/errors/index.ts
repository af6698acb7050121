/**
 * Error category shared by every outbound collaborator.
 *
 * - "Validation": request rejected as malformed (400): do not retry
 * - "Auth": credentials invalid (401/403): do not retry
 * - "RateLimit": too many requests (429): retry with backoff
 * - "Transient": server error, timeout, network error: retry
 * - "Permanent": unrecoverable error: do not retry
 */
export type ErrorCategory = "Validation" | "Auth" | "RateLimit" | "Transient" | "Permanent";

function isRetryableCategory(category: ErrorCategory): boolean {
  return category === "RateLimit" || category === "Transient";
}

/**
 * CarrierError
 * Structured error type thrown by label service adapters.
 * Lets the uploader decide retry and reconciliation based on the category.
 */
export class CarrierError extends Error {
  readonly category: ErrorCategory;

  /**
   * Carrier-specific error code (e.g. "HTTP_503", "KO")
   */
  readonly carrierCode?: string;

  /**
   * Raw carrier error response for debugging
   */
  readonly raw?: unknown;

  /**
   * Suggested retry delay in milliseconds (for RateLimit errors)
   */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    category: ErrorCategory,
    opts?: {
      carrierCode?: string;
      raw?: unknown;
      retryAfterMs?: number;
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, CarrierError.prototype);
    this.name = "CarrierError";
    this.category = category;
    this.carrierCode = opts?.carrierCode;
    this.raw = opts?.raw;
    this.retryAfterMs = opts?.retryAfterMs;
  }

  isRetryable(): boolean {
    return isRetryableCategory(this.category);
  }
}

/**
 * GeocodingError
 * Thrown by geocoding adapters when the provider cannot answer.
 * A provider answer of "no results" is not an error: it comes back as a candidate.
 */
export class GeocodingError extends Error {
  readonly category: ErrorCategory;
  readonly providerStatus?: string;
  readonly retryAfterMs?: number;
  readonly raw?: unknown;

  constructor(
    message: string,
    category: ErrorCategory,
    opts?: {
      providerStatus?: string;
      retryAfterMs?: number;
      raw?: unknown;
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, GeocodingError.prototype);
    this.name = "GeocodingError";
    this.category = category;
    this.providerStatus = opts?.providerStatus;
    this.retryAfterMs = opts?.retryAfterMs;
    this.raw = opts?.raw;
  }

  isRetryable(): boolean {
    return isRetryableCategory(this.category);
  }
}

/**
 * TimeoutError
 * Raised when an outbound call exceeds its deadline. Always transient.
 */
export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    Object.setPrototypeOf(this, TimeoutError.prototype);
    this.name = "TimeoutError";
  }
}

/**
 * ValidationError
 * Thrown when input validation fails
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = "ValidationError";
  }
}

/**
 * Whether an error thrown by a collaborator may succeed on a later attempt.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TimeoutError) return true;
  if (error instanceof CarrierError || error instanceof GeocodingError) {
    return error.isRetryable();
  }
  return false;
}

/**
 * Retry delay requested by the collaborator, if any
 */
export function retryAfterOf(error: unknown): number | undefined {
  if (error instanceof CarrierError || error instanceof GeocodingError) {
    return error.retryAfterMs;
  }
  return undefined;
}
