/**
 * Worker Pool
 *
 * Fixed number of slots; a slot frees the moment its task settles. Every
 * started task is tracked until it settles, and a rejection is handed to
 * onError instead of escaping.
 */

export class PoolFullError extends Error {
  constructor(capacity: number) {
    super(`Worker pool is full (${capacity} slots)`);
    this.name = 'PoolFullError';
  }
}

export class WorkerPool {
  private readonly running = new Set<Promise<void>>();
  private peak = 0;

  constructor(
    private readonly capacity: number,
    private readonly onError: (error: unknown) => void
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Worker pool capacity must be a positive integer, got ${capacity}`);
    }
  }

  get active(): number {
    return this.running.size;
  }

  get freeSlots(): number {
    return this.capacity - this.running.size;
  }

  /** Highest concurrency seen so far */
  get peakActive(): number {
    return this.peak;
  }

  /**
   * Start a task in a free slot. Throws PoolFullError when none is free.
   */
  start(task: () => Promise<void>): void {
    if (this.freeSlots <= 0) {
      throw new PoolFullError(this.capacity);
    }

    const tracked: Promise<void> = Promise.resolve()
      .then(task)
      .catch((error: unknown) => this.onError(error))
      .finally(() => {
        this.running.delete(tracked);
      });

    this.running.add(tracked);
    this.peak = Math.max(this.peak, this.running.size);
  }

  /**
   * Resolves once any running task has settled and freed its slot.
   * Resolves immediately when nothing is running.
   */
  whenAnySettles(): Promise<void> {
    if (this.running.size === 0) return Promise.resolve();
    return Promise.race(this.running);
  }

  /** Resolves when every running task has settled */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running);
    }
  }
}
