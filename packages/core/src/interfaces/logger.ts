/**
 * Logger
 * Minimal structured logger injected into adapters and pipeline components.
 * Any console-like or pino-like logger can be adapted to it.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
