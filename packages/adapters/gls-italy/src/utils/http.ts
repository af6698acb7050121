import type { AdapterContext, HttpClient, HttpClientConfig } from '@spedisci/core';
import { CarrierError } from '@spedisci/core';

/**
 * Form POST settings for the ASMX endpoints: text answers, deadline and
 * cancellation taken from the context
 */
export function formRequestConfig(ctx: AdapterContext): HttpClientConfig {
  return {
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    responseType: 'text',
    ...(ctx.timeoutMs !== undefined && { timeout: ctx.timeoutMs }),
    ...(ctx.signal && { signal: ctx.signal }),
  };
}

export function requireHttp(ctx: AdapterContext): HttpClient {
  if (!ctx.http) {
    throw new CarrierError('HTTP client not provided in context', 'Permanent');
  }
  return ctx.http;
}
