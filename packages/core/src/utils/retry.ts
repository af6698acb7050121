import { isTransientError, retryAfterOf } from '../errors/index.js';
import { RETRY_BASE_DELAY_MS, RETRY_JITTER_MS, RETRY_MAX_ATTEMPTS } from '../constants.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: RETRY_MAX_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  jitterMs: RETRY_JITTER_MS,
};

/**
 * Exponential backoff with additive jitter: base * 2^(attempt-1) + [0, jitter).
 * A delay requested by the collaborator (Retry-After) wins when longer.
 */
export function computeBackoffMs(
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  random: () => number = Math.random,
  retryAfterMs?: number
): number {
  const exponent = Math.max(0, attempt - 1);
  const base = policy.baseDelayMs * Math.pow(2, exponent);
  const jitter = Math.floor(random() * policy.jitterMs);
  return Math.max(base + jitter, retryAfterMs ?? 0);
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });

export interface RetryOptions {
  policy?: RetryPolicy;
  random?: () => number;
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run fn until it succeeds, throws a non-transient error, or attempts run out.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const policy = opts.policy ?? DEFAULT_RETRY_POLICY;
  const wait = opts.sleep ?? sleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isTransientError(err) || attempt >= policy.maxAttempts || opts.signal?.aborted) {
        throw err;
      }
      const delayMs = computeBackoffMs(attempt, policy, opts.random, retryAfterOf(err));
      opts.onRetry?.(err, attempt, delayMs);
      await wait(delayMs, opts.signal);
    }
  }
}
