/**
 * Logging Utilities for Adapters and Flows
 *
 * Provides safe logging helpers that respect LoggingOptions
 * to prevent verbose logging of large provider responses.
 */

import type { AdapterContext, LoggingOptions } from '../interfaces/index.js';
import type { Logger } from '../interfaces/logger.js';
import { isRecord } from './logging.js';

/**
 * Default logging options
 * Conservative defaults to avoid polluting logs with large responses
 */
const DEFAULT_LOGGING_OPTIONS: Required<LoggingOptions> = {
  maxArrayItems: 10,
  maxDepth: 2,
  logRawResponse: 'summary',
  logMetadata: false,
  silentOperations: [],
};

/**
 * Check if logging should be suppressed for this operation
 */
export function isSilentOperation(
  ctx: AdapterContext,
  defaultSilentOps: string[] = []
): boolean {
  const operationName = ctx.operationName;
  if (!operationName) return false;

  const silentOps = [
    ...(ctx.loggingOptions?.silentOperations ?? defaultSilentOps),
    ...DEFAULT_LOGGING_OPTIONS.silentOperations,
  ];

  return silentOps.includes(operationName);
}

/**
 * Get merged logging options with defaults
 */
export function getLoggingOptions(ctx: AdapterContext): Required<LoggingOptions> {
  return {
    ...DEFAULT_LOGGING_OPTIONS,
    ...ctx.loggingOptions,
  };
}

/**
 * Safely truncate a value for logging
 * Respects maxDepth and maxArrayItems
 */
export function truncateForLogging(
  obj: unknown,
  options: Required<LoggingOptions>,
  currentDepth: number = 0
): unknown {
  if (currentDepth >= options.maxDepth) {
    if (Array.isArray(obj)) {
      return `[Array: ${obj.length} items]`;
    }
    if (isRecord(obj)) {
      return `[Object: ${Object.keys(obj).length} keys]`;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    if (options.maxArrayItems === 0) {
      return `[Array: ${obj.length} items (truncated)]`;
    }

    const mapped = obj
      .slice(0, options.maxArrayItems)
      .map((item: unknown) => truncateForLogging(item, options, currentDepth + 1));

    if (obj.length > options.maxArrayItems) {
      return [...mapped, `... and ${obj.length - options.maxArrayItems} more items`];
    }
    return mapped;
  }

  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      // Skip metadata unless explicitly requested
      if (key === 'metadata' && !options.logMetadata) {
        const count = isRecord(value) ? Object.keys(value).length : 0;
        result[key] = `[Object: metadata (${count} keys, omitted)]`;
        continue;
      }
      result[key] = truncateForLogging(value, options, currentDepth + 1);
    }
    return result;
  }

  return obj;
}

/**
 * Create a summary of a raw provider response
 * Returns summary info without the full payload
 */
export function summarizeRawResponse(raw: unknown): Record<string, unknown> {
  if (raw === undefined || raw === null || raw === '') return { message: 'No raw response' };

  if (Array.isArray(raw)) {
    const firstItem: unknown = raw[0];
    const keys = isRecord(firstItem) ? Object.keys(firstItem) : [];
    return {
      type: 'array',
      count: raw.length,
      itemKeys: keys.slice(0, 5),
      itemCount: keys.length,
    };
  }

  if (isRecord(raw)) {
    const keys = Object.keys(raw);
    return {
      type: 'object',
      keyCount: keys.length,
      keys: keys.slice(0, 10),
    };
  }

  return {
    type: typeof raw,
    value: String(raw).slice(0, 100),
  };
}

function processRaw(value: unknown, options: Required<LoggingOptions>): unknown {
  if (options.logRawResponse === 'summary') return summarizeRawResponse(value);
  return truncateForLogging(value, options);
}

/**
 * Safely log a payload with size checks
 * Respects logging options to avoid verbose logs
 */
export function safeLog(
  logger: Logger | undefined,
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string,
  data: Record<string, unknown>,
  ctx: AdapterContext,
  silentOperationNames: string[] = ['geocode']
): void {
  if (!logger) return;

  if (isSilentOperation(ctx, silentOperationNames)) {
    return;
  }

  const options = getLoggingOptions(ctx);
  const processedData: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (key === 'raw' || key === 'rawCarrierResponse') {
      if (options.logRawResponse === false) continue;
      processedData[key] = processRaw(value, options);
    } else if (value && typeof value === 'object' && !key.startsWith('_')) {
      processedData[key] = truncateForLogging(value, options);
    } else {
      processedData[key] = value;
    }
  }

  logger[level](message, processedData);
}
