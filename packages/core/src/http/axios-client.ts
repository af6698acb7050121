import axios, { isAxiosError, type AxiosInstance, type AxiosRequestConfig } from "axios";
import type { HttpClient, HttpClientConfig, HttpResponse } from "../interfaces/http-client.js";
import type { Logger } from '../interfaces/logger.js';
import { sanitizeHeadersForLog } from '../utils/logging.js';
import { HttpError } from './errors.js';

export interface AxiosHttpClientOptions {
  axiosInstance?: AxiosInstance;
  defaultTimeoutMs?: number;
  debug?: boolean;
  debugFullBody?: boolean;
  logger?: Logger;
}

type Method = 'GET' | 'POST';

function toAxiosConfig(config?: HttpClientConfig): AxiosRequestConfig {
  const ac: AxiosRequestConfig = {};
  if (!config) return ac;
  if (config.headers) ac.headers = config.headers;
  if (typeof config.timeout === "number") ac.timeout = config.timeout;
  if (config.params) ac.params = config.params;
  if (config.signal) ac.signal = config.signal;
  if (config.responseType === "text") {
    ac.responseType = "text";
  } else if (config.responseType === "arraybuffer") {
    ac.responseType = "arraybuffer";
  }
  return ac;
}

function normalizeHeaders(headers: unknown): Record<string, string | string[]> {
  const out: Record<string, string | string[]> = {};
  if (!headers || typeof headers !== 'object') return out;
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') out[key.toLowerCase()] = value;
    else if (Array.isArray(value)) out[key.toLowerCase()] = value.map(String);
    else if (typeof value === 'number' || typeof value === 'boolean') out[key.toLowerCase()] = String(value);
  }
  return out;
}

function bodyLength(data: unknown): number {
  if (data === undefined || data === null) return 0;
  if (typeof data === 'string') return data.length;
  if (data instanceof URLSearchParams) return data.toString().length;
  try {
    return JSON.stringify(data)?.length ?? 0;
  } catch {
    return 0;
  }
}

function toHttpError(err: unknown): unknown {
  if (!isAxiosError(err)) return err;
  return new HttpError(err.message, {
    isAxiosError: true,
    status: err.response?.status,
    code: err.code,
    response: err.response
      ? {
          status: err.response.status,
          statusText: err.response.statusText,
          data: err.response.data,
          headers: normalizeHeaders(err.response.headers),
        }
      : undefined,
  });
}

function defaultLogger(): Logger {
  return {
    debug: (m, meta) => console.debug('[http][debug]', m, meta),
    info: (m, meta) => console.info('[http][info]', m, meta),
    warn: (m, meta) => console.warn('[http][warn]', m, meta),
    error: (m, meta) => console.error('[http][error]', m, meta),
  };
}

/**
 * Create a HttpClient implementation backed by Axios.
 * - Normalizes responses to HttpResponse and failures to HttpError.
 * - Debug logging (HTTP_DEBUG=1) redacts credentials; HTTP_DEBUG_FULL=1 adds bodies.
 */
export function createAxiosHttpClient(opts: AxiosHttpClientOptions = {}): HttpClient {
  const instance: AxiosInstance =
    opts.axiosInstance ??
    axios.create({ timeout: opts.defaultTimeoutMs ?? 30_000 });

  const debug = opts.debug ?? (process.env.HTTP_DEBUG === '1');
  const debugFullBody = opts.debugFullBody ?? (process.env.HTTP_DEBUG_FULL === '1');
  const log = opts.logger ?? defaultLogger();

  async function send<T>(method: Method, url: string, data: unknown, config?: HttpClientConfig): Promise<HttpResponse<T>> {
    const ac = toAxiosConfig(config);
    if (debug) {
      log.debug('request', {
        method,
        url,
        headers: sanitizeHeadersForLog(config?.headers),
        bodyLength: bodyLength(data),
        ...(debugFullBody && data !== undefined && { body: data }),
      });
    }
    try {
      const res = await instance.request<T>({ method, url, data, ...ac });
      if (debug) {
        log.debug('response', {
          status: res.status,
          statusText: res.statusText,
          headers: sanitizeHeadersForLog(normalizeHeaders(res.headers)),
          ...(debugFullBody ? { body: res.data } : { bodyLength: bodyLength(res.data) }),
        });
      }
      return {
        status: res.status,
        headers: normalizeHeaders(res.headers),
        body: res.data,
      };
    } catch (err) {
      const normalized = toHttpError(err);
      if (debug) {
        log.debug('error', {
          status: normalized instanceof HttpError ? normalized.status : undefined,
          code: normalized instanceof HttpError ? normalized.code : undefined,
          error: err instanceof Error ? err.message : String(err),
          ...(debugFullBody && normalized instanceof HttpError && normalized.response && { body: normalized.response.data }),
        });
      }
      throw normalized;
    }
  }

  return {
    get: <T = unknown>(url: string, config?: HttpClientConfig) => send<T>('GET', url, undefined, config),
    post: <T = unknown>(url: string, data?: unknown, config?: HttpClientConfig) => send<T>('POST', url, data, config),
  };
}

export default createAxiosHttpClient;
