/**
 * Details carried by a normalized HTTP failure
 */
export interface HttpErrorDetails {
  isAxiosError?: boolean;

  /** HTTP status when the server answered */
  status?: number;

  /** Transport error code when it did not, e.g. "ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED" */
  code?: string;

  response?: {
    status: number;
    statusText: string;
    data: unknown;
    headers?: Record<string, string | string[]>;
  };
}

/**
 * HTTP Error Type
 * Typed error thrown by HttpClient implementations, independent of the library underneath
 */
export class HttpError extends Error {
  isAxiosError?: boolean;
  status?: number;
  code?: string;
  response?: HttpErrorDetails['response'];

  constructor(message: string, details?: HttpErrorDetails) {
    super(message);
    Object.setPrototypeOf(this, HttpError.prototype);
    this.name = 'HttpError';
    this.isAxiosError = details?.isAxiosError;
    this.status = details?.status;
    this.code = details?.code;
    this.response = details?.response;
  }

  /** The request never got an answer within its deadline */
  isTimeout(): boolean {
    return this.code === 'ECONNABORTED' || this.code === 'ETIMEDOUT';
  }
}
