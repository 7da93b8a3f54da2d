/**
 * Worker Pool
 * Bounded fan-out / fan-in over a fixed list of tasks
 *
 * At most `size` tasks are in flight at once. Every task settles before
 * `run` resolves, and results come back in input order regardless of
 * completion order.
 */

export interface WorkerPoolStats {
  total: number;
  completed: number;
  failed: number;
  maxActive: number;
}

export class WorkerPool {
  private activeNow = 0;
  private stats: WorkerPoolStats = {
    total: 0,
    completed: 0,
    failed: 0,
    maxActive: 0,
  };

  constructor(
    private readonly size: number,
    private readonly name: string = 'pool'
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool "${name}" size must be a positive integer, got ${size}`);
    }
  }

  get capacity(): number {
    return this.size;
  }

  /**
   * Run `task` for every item, never more than `size` concurrently.
   * Failures are captured per item; `run` itself never rejects.
   */
  async run<I, O>(
    items: readonly I[],
    task: (item: I, index: number) => Promise<O>
  ): Promise<PromiseSettledResult<O>[]> {
    const results = new Array<PromiseSettledResult<O>>(items.length);
    const queue = items.map((item, index) => ({ item, index }));
    let next = 0;

    const worker = async (): Promise<void> => {
      for (let entry = queue[next++]; entry; entry = queue[next++]) {
        const { item, index } = entry;

        this.activeNow++;
        this.stats.total++;
        this.stats.maxActive = Math.max(this.stats.maxActive, this.activeNow);
        try {
          results[index] = { status: 'fulfilled', value: await task(item, index) };
          this.stats.completed++;
        } catch (reason) {
          results[index] = { status: 'rejected', reason };
          this.stats.failed++;
        } finally {
          this.activeNow--;
        }
      }
    };

    const runners = Math.min(this.size, items.length);
    await Promise.all(Array.from({ length: runners }, () => worker()));
    return results;
  }

  getStats() {
    return {
      ...this.stats,
      name: this.name,
      activeNow: this.activeNow,
      capacity: this.size,
    };
  }
}
