/**
 * Utility functions for adapters and flows
 */

export { serializeForLog, truncateString, sanitizeHeadersForLog, errorToLog, isRecord } from './logging.js';
export {
  safeLog,
  isSilentOperation,
  getLoggingOptions,
  truncateForLogging,
  summarizeRawResponse,
} from './logging-helpers.js';
export { computeBackoffMs, withRetry, sleep, DEFAULT_RETRY_POLICY } from './retry.js';
export type { RetryPolicy, RetryOptions, Sleep } from './retry.js';
export { withTimeout } from './timeout.js';
