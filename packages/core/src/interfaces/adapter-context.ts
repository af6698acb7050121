import type { HttpClient } from './http-client.js';
import type { Logger } from './logger.js';

/**
 * Logging options for controlling verbosity of adapter operations
 */
export interface LoggingOptions {
  /**
   * Maximum number of items to log in array responses
   * Set to 0 to skip logging the array entirely
   */
  maxArrayItems?: number;

  /**
   * Maximum depth for nested object logging
   */
  maxDepth?: number;

  /**
   * Whether to log raw collaborator responses
   * false = skip, true = full (truncated by depth), "summary" = count/keys only
   * Default: "summary"
   */
  logRawResponse?: boolean | "summary";

  /**
   * Whether to include nested metadata in logs
   * Default: false
   */
  logMetadata?: boolean;

  /**
   * Operations to suppress logging for
   * Examples: ["geocode", "queryStatus"]
   */
  silentOperations?: string[];
}

/**
 * AdapterContext
 * Context passed to adapter methods containing injected dependencies
 */
export interface AdapterContext {
  /** Injected HTTP client */
  http?: HttpClient;

  /** Optional logger instance */
  logger?: Logger;

  /**
   * Optional logging configuration for this operation
   * Default: { logRawResponse: "summary", maxArrayItems: 10, maxDepth: 2 }
   */
  loggingOptions?: LoggingOptions;

  /**
   * Operation name for context-aware logging, matched against silentOperations
   * Examples: "submitShipments", "geocode"
   */
  operationName?: string;

  /** Per-call deadline in milliseconds, forwarded to the HTTP client */
  timeoutMs?: number;

  /** Aborts the in-flight request when the run is cancelled */
  signal?: AbortSignal;
}
