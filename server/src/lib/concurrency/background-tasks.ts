/**
 * Background Tasks
 * Detached work started by a request (discovery, menu batches)
 *
 * Failures are logged, never rethrown. Tracking the in-flight promises lets
 * graceful shutdown and tests wait for them.
 */

import { logger, errorContext } from '../logger/structured-logger.js';

export class BackgroundTasks {
  private inFlight = new Set<Promise<void>>();
  private stats = { started: 0, failed: 0 };

  run(name: string, fn: () => Promise<unknown>, context: Record<string, unknown> = {}): void {
    this.stats.started++;
    const startTime = Date.now();

    const task = fn()
      .then(() => {
        logger.debug({ task: name, durationMs: Date.now() - startTime, ...context }, '[BG] Task finished');
      })
      .catch((err: unknown) => {
        this.stats.failed++;
        logger.error({ task: name, err: errorContext(err), ...context }, '[BG] Task failed');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }

  get size(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every task (including ones started while draining) settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  getStats() {
    return { ...this.stats, inFlight: this.inFlight.size };
  }
}
