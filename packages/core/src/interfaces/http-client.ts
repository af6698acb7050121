/**
 * Standardized HTTP response
 *
 * Every HttpClient implementation normalizes to this shape so adapters never
 * inspect library-specific response objects.
 */
export interface HttpResponse<T = unknown> {
  /** HTTP status code */
  status: number;

  /** Response headers */
  headers: Record<string, string | string[]>;

  /**
   * Response body: parsed JSON, text, or raw bytes depending on responseType
   */
  body: T;
}

/**
 * HttpClient interface
 * Pluggable HTTP client used by adapters; integrators may inject their own.
 */
export interface HttpClient {
  get<T = unknown>(url: string, config?: HttpClientConfig): Promise<HttpResponse<T>>;

  post<T = unknown>(url: string, data?: unknown, config?: HttpClientConfig): Promise<HttpResponse<T>>;
}

export interface HttpClientConfig {
  /** Request headers to send */
  headers?: Record<string, string>;

  /** Request timeout in milliseconds */
  timeout?: number;

  /** Query parameters (appended to URL) */
  params?: Record<string, string | number | boolean | undefined>;

  /**
   * Expected response type hint
   * - "json": parse response as JSON (default)
   * - "text": keep the body as a string (XML web services)
   * - "arraybuffer": raw bytes
   */
  responseType?: 'json' | 'text' | 'arraybuffer';

  /** Cancels the request */
  signal?: AbortSignal;
}
