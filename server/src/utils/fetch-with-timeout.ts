/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController. One deadline spans the request
 * and the body read; the timer is always cleared in the finally block.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'ABORT' | 'HTTP_ERROR' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  requestId?: string;
  stage?: string;
  provider?: string;
  /** Optional caller-scoped abort signal; when aborted, the fetch is cancelled. */
  signal?: AbortSignal;
}

/**
 * Structured upstream failure (timeouts, network errors, non-2xx answers)
 */
export class UpstreamFetchError extends Error {
  readonly code = 'UPSTREAM_ERROR';

  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly provider: string,
    public readonly host: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'UpstreamFetchError';
  }
}

/**
 * Transport-level failures worth another attempt: timeouts, network errors, 429 and 5xx
 */
export function isRetryableUpstreamError(err: unknown): boolean {
  if (!(err instanceof UpstreamFetchError)) return false;
  if (err.errorKind === 'TIMEOUT' || err.errorKind === 'NETWORK_ERROR') return true;
  if (err.errorKind === 'HTTP_ERROR' && err.status !== undefined) {
    return err.status === 429 || err.status >= 500;
  }
  return false;
}

/**
 * Settles with `work`, or rejects as soon as `signal` aborts. Mocked or
 * detached bodies ignore the fetch signal, so the body read is raced too.
 */
function untilAborted<T>(signal: AbortSignal, work: Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void work
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/**
 * Fetch with automatic timeout using AbortController.
 *
 * The deadline covers the whole exchange: headers AND the body read done by
 * `read`. Errors thrown by `read` itself (bad status, unparsable JSON) pass
 * through unchanged unless the deadline fired first.
 *
 * @throws UpstreamFetchError if the request times out, is aborted or fails at network level
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const startTime = Date.now();
  // Never log query strings: they may carry credentials
  const { host, pathname } = new URL(url);
  const provider = config.provider || 'unknown';
  let timedOut = false;
  let phase: 'request' | 'body' = 'request';

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  const onCallerAbort = () => controller.abort();
  if (config.signal) {
    if (config.signal.aborted) {
      controller.abort();
    } else {
      config.signal.addEventListener('abort', onCallerAbort);
    }
  }

  logger.debug({
    method: options.method || 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
    stage: config.stage || 'unknown',
    requestId: config.requestId,
  }, '[FETCH] Outbound request');

  try {
    const response = await untilAborted(controller.signal, fetch(url, {
      ...options,
      signal: controller.signal
    }));

    logger.debug({
      host,
      path: pathname,
      status: response.status,
      durationMs: Date.now() - startTime,
    }, '[FETCH] Response');

    phase = 'body';
    return await untilAborted(controller.signal, read(response));
  } catch (err) {
    if (phase === 'body' && !controller.signal.aborted) throw err;

    const durationMs = Date.now() - startTime;
    const errorKind: FetchErrorKind = timedOut
      ? 'TIMEOUT'
      : controller.signal.aborted ? 'ABORT' : 'NETWORK_ERROR';

    logger.warn({
      host,
      errorKind,
      phase,
      durationMs,
      provider,
      reason: err instanceof Error ? err.message : String(err),
    }, '[FETCH] Request failed');

    throw new UpstreamFetchError(
      `${provider} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms (${host})`,
      errorKind,
      provider,
      host
    );
  } finally {
    clearTimeout(timeoutId);
    config.signal?.removeEventListener('abort', onCallerAbort);
  }
}
