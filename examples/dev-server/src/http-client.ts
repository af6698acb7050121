import type { FastifyBaseLogger } from 'fastify';
import { createAxiosHttpClient } from '@spedisci/core';
import type { HttpClient, Logger } from '@spedisci/core';

/**
 * Adapt Fastify's pino logger to the core Logger interface
 */
export function wrapPinoLogger(pinoLogger: FastifyBaseLogger): Logger {
  return {
    debug: (message, meta) => pinoLogger.debug({ ...meta }, message),
    info: (message, meta) => pinoLogger.info({ ...meta }, message),
    warn: (message, meta) => pinoLogger.warn({ ...meta }, message),
    error: (message, meta) => pinoLogger.error({ ...meta }, message),
  };
}

/**
 * HttpClient bound to the server logger.
 * Request/response debug lines are emitted only at debug level.
 */
export function makeHttpClient(opts: { logger: FastifyBaseLogger; timeoutMs: number; debug: boolean }): HttpClient {
  return createAxiosHttpClient({
    defaultTimeoutMs: opts.timeoutMs,
    debug: opts.debug,
    logger: wrapPinoLogger(opts.logger),
  });
}
