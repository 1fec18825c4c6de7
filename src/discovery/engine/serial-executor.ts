/**
 * Serial Executor
 *
 * Single-consumer task queue that confines the engine's mutable state.
 * Tasks run one at a time in submission order; a task that returns a
 * promise holds the queue until that promise settles.
 *
 * State-touching work is submitted as short synchronous tasks. Network
 * calls and timers run outside the queue and submit their continuation.
 */

/**
 * Serial executor statistics
 */
export interface SerialExecutorStats {
  /** Tasks submitted but not yet finished */
  pending: number;
  /** Tasks finished since creation */
  completed: number;
}

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private completed = 0;

  /**
   * Queue a task and resolve with its result
   *
   * A failing task rejects its own promise only; later tasks still run.
   */
  submit<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;

    const run = this.tail.then(async () => {
      try {
        return await task();
      } finally {
        this.pending--;
        this.completed++;
      }
    });

    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  /**
   * Resolves once every task submitted so far has finished
   */
  drain(): Promise<void> {
    return this.tail;
  }

  getStats(): SerialExecutorStats {
    return { pending: this.pending, completed: this.completed };
  }
}
