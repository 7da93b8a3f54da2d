/**
 * Retry-with-backoff shared by the LLM provider and the places client.
 * A `RetryPolicy` travels in config; the caller decides what is retryable.
 */

import { sleep } from './timeout-guard.js';

export interface RetryPolicy {
  /** Attempts in total, the first one included */
  maxAttempts: number;
  /** Wait before attempt N is `backoffMs[N]`; the first attempt never waits */
  backoffMs: number[];
}

export interface RetryConfig<T> extends RetryPolicy {
  fn: (attempt: number) => Promise<T>;
  isRetryable: (error: unknown, attempt: number) => boolean;
  /** Called after a failed attempt that will be retried, with the upcoming wait */
  onRetry?: (error: unknown, attempt: number, nextDelay: number) => void;
}

export const NO_RETRY: RetryPolicy = { maxAttempts: 1, backoffMs: [0] };

export async function retryWithBackoff<T>(config: RetryConfig<T>): Promise<T> {
  const { fn, isRetryable, backoffMs, onRetry } = config;
  const lastAttempt = Math.max(1, Math.floor(config.maxAttempts)) - 1;

  for (let attempt = 0; ; attempt++) {
    const wait = attempt === 0 ? 0 : backoffMs[attempt] ?? 0;
    if (wait > 0) await sleep(wait);

    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= lastAttempt || !isRetryable(err, attempt)) throw err;
      onRetry?.(err, attempt, backoffMs[attempt + 1] ?? 0);
    }
  }
}
