interface QueuedTask {
  start: () => void;
}

/**
 * Runs async tasks with at most `concurrency` in flight; the rest wait in
 * FIFO order. Each `run()` settles with its own task's outcome.
 */
export class TaskPool {
  private queue: QueuedTask[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`TaskPool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.running++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.next();
          });
      };

      if (this.running < this.concurrency) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  /** Resolves once nothing is running or queued. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private next(): void {
    const queued = this.queue.shift();
    if (queued) {
      queued.start();
      return;
    }
    if (this.running === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
