// ============================================================================
// Semaphore
// ============================================================================

/**
 * Counting semaphore for limiting concurrency.
 *
 * With a single permit it acts as an async mutex: the SQLite adapter uses one
 * to keep interleaved callers on a shared connection from overlapping.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.permits = permits;
    this.maxPermits = permits;
  }

  /**
   * Acquire a permit
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Release a permit
   */
  release(): void {
    if (this.waiters.length > 0) {
      const waiter = this.waiters.shift();
      waiter?.();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  /**
   * Get available permits
   */
  available(): number {
    return this.permits;
  }

  /**
   * Execute with automatic acquire/release
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
