// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  CarrierError,
  GeocodingError,
  TimeoutError,
  ValidationError,
  isTransientError,
  retryAfterOf,
} from './errors/index.js';
export type { ErrorCategory } from './errors/index.js';

// Tunables
export * from './constants.js';

// Pipeline components
export * from './layout/index.js';
export * from './address/index.js';
export * from './shipments/index.js';
export * from './ledger/index.js';

// Persistence
export * from './stores/index.js';

// Orchestration
export * from './flows/index.js';

// Http client
export { createAxiosHttpClient } from './http/axios-client.js';
export type { AxiosHttpClientOptions } from './http/axios-client.js';
export { HttpError } from './http/errors.js';
export type { HttpErrorDetails } from './http/errors.js';

// Utilities
export {
  serializeForLog,
  truncateString,
  sanitizeHeadersForLog,
  errorToLog,
  isRecord,
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeRawResponse,
  safeLog,
  computeBackoffMs,
  withRetry,
  sleep,
  withTimeout,
  DEFAULT_RETRY_POLICY,
} from './utils/index.js';
export type { RetryPolicy, RetryOptions, Sleep } from './utils/index.js';
