import { z } from 'zod';
import {
  CARRIER_TIMEOUT_MS,
  GEOCODE_CONCURRENCY,
  GEOCODE_TIMEOUT_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  ValidationError,
} from '@spedisci/core';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    LEDGER_PATH: z.string().min(1).default('ledger.sqlite'),

    GLS_SITE: z.string().optional(),
    GLS_CUSTOMER_CODE: z.string().optional(),
    GLS_PASSWORD: z.string().optional(),
    GLS_CONTRACT_CODE: z.string().optional(),
    GLS_ENDPOINT: z.url().optional(),
    GLS_TEST_ENDPOINT: z.url().optional(),

    GOOGLE_API_KEY: z.string().optional(),

    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(CARRIER_TIMEOUT_MS),
    GEOCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(GEOCODE_TIMEOUT_MS),
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(RETRY_MAX_ATTEMPTS),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(RETRY_BASE_DELAY_MS),
    GEOCODE_CONCURRENCY: z.coerce.number().int().min(1).default(GEOCODE_CONCURRENCY),
    REQUIRE_PHONE: flag,

    /** Serve the in-process carrier and geocoder instead of the real services */
    USE_SIMULATED_SERVICES: flag,
  })
  .superRefine((env, issues) => {
    if (env.USE_SIMULATED_SERVICES) return;
    const required = ['GLS_SITE', 'GLS_CUSTOMER_CODE', 'GLS_PASSWORD', 'GLS_CONTRACT_CODE', 'GOOGLE_API_KEY'] as const;
    for (const key of required) {
      if (!env[key]) {
        issues.addIssue({ code: 'custom', path: [key], message: `${key} is required unless USE_SIMULATED_SERVICES is set` });
      }
    }
  });

export interface DevServerConfig {
  port: number;
  host: string;
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
  ledgerPath: string;
  simulated: boolean;
  gls?: {
    credentials: { site: string; customerCode: string; password: string; contractCode: string };
    baseUrl?: string;
    testBaseUrl?: string;
  };
  googleApiKey?: string;
  httpTimeoutMs: number;
  geocodeTimeoutMs: number;
  retry: { maxAttempts: number; baseDelayMs: number };
  geocodeConcurrency: number;
  requirePhone: boolean;
}

/**
 * Read the server settings from the environment (.env is loaded by the entry point)
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DevServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }
  const e = parsed.data;

  const gls =
    e.GLS_SITE && e.GLS_CUSTOMER_CODE && e.GLS_PASSWORD && e.GLS_CONTRACT_CODE
      ? {
          credentials: {
            site: e.GLS_SITE,
            customerCode: e.GLS_CUSTOMER_CODE,
            password: e.GLS_PASSWORD,
            contractCode: e.GLS_CONTRACT_CODE,
          },
          ...(e.GLS_ENDPOINT !== undefined && { baseUrl: e.GLS_ENDPOINT }),
          ...(e.GLS_TEST_ENDPOINT !== undefined && { testBaseUrl: e.GLS_TEST_ENDPOINT }),
        }
      : undefined;

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    ledgerPath: e.LEDGER_PATH,
    simulated: e.USE_SIMULATED_SERVICES,
    ...(gls && { gls }),
    ...(e.GOOGLE_API_KEY ? { googleApiKey: e.GOOGLE_API_KEY } : {}),
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    geocodeTimeoutMs: e.GEOCODE_TIMEOUT_MS,
    retry: { maxAttempts: e.RETRY_MAX_ATTEMPTS, baseDelayMs: e.RETRY_BASE_DELAY_MS },
    geocodeConcurrency: e.GEOCODE_CONCURRENCY,
    requirePhone: e.REQUIRE_PHONE,
  };
}
