/**
 * Deadlines for outbound calls
 *
 * Every LLM call in the menu pipeline runs under a deadline so a slow
 * upstream never holds a worker slot past its budget.
 */

export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Runs `run` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with TimeoutError once the deadline passes, whether or not
 * `run` honours the signal.
 */
export function withDeadline<T>(
  operation: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  return Promise.race([run(controller.signal), deadline]).finally(() => clearTimeout(timer));
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
