import { EventEmitter } from 'node:events';
import { errorMeta, logger } from '../logger.js';
import type { ApiError } from '../twitch/errors.js';
import type { StreamWatcher, WatcherSnapshot } from './StreamWatcher.js';
import { TaskPool } from './TaskPool.js';

export interface WatchSchedulerOptions {
  intervalMs: number;
  /** Upper bound on channels polled at the same time. */
  workers: number;
}

/**
 * Drives every watcher from one shared timer. Each tick is a unit of work on
 * a bounded pool; a watcher whose previous tick is still running is skipped
 * for that round, so one channel's ticks never overlap.
 *
 * Skipped rounds are not queued: a channel whose tick outlasted the interval
 * is next polled on the following timer round, at most one interval late.
 * This keeps a slow channel from piling ticks into the shared pool.
 *
 * Re-emits a watcher's 'fatal' as ('fatal', login, error).
 */
export class WatchScheduler extends EventEmitter {
  private timer: ReturnType<typeof setInterval> | null = null;
  private pool: TaskPool;
  private readonly intervalMs: number;
  /** Logins with a tick queued or running. */
  private submitted = new Set<string>();

  constructor(
    private watchers: StreamWatcher[],
    options: WatchSchedulerOptions,
  ) {
    super();
    this.intervalMs = options.intervalMs;
    this.pool = new TaskPool(options.workers);

    for (const watcher of watchers) {
      watcher.on('fatal', (err: ApiError) => this.emit('fatal', watcher.login, err));
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    logger.info(
      `[Scheduler] Watching ${this.watchers.length} channel(s), polling every ${this.intervalMs / 1000}s with ${this.pool.concurrency} worker(s)`,
    );
    this.runRound();
    this.timer = setInterval(() => this.runRound(), this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    logger.info('[Scheduler] Stopped');
  }

  /**
   * Wait for in-flight ticks, at most `timeoutMs`. Returns false when the
   * deadline passed first; those ticks are abandoned.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    let deadline: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<false>((resolve) => {
      deadline = setTimeout(() => resolve(false), timeoutMs);
    });
    const idle = this.pool.onIdle().then((): true => true);

    const drained = await Promise.race([idle, expired]);
    clearTimeout(deadline);
    if (!drained) {
      logger.warn(`[Scheduler] ${this.pool.active + this.pool.pending} tick(s) still running after ${timeoutMs}ms, abandoning`);
    }
    return drained;
  }

  snapshot(): WatcherSnapshot[] {
    return this.watchers.map((w) => w.snapshot());
  }

  /** Submit one tick per idle watcher. */
  runRound(): void {
    for (const watcher of this.watchers) {
      if (this.submitted.has(watcher.login) || watcher.isBusy()) {
        logger.debug(`[Scheduler] Previous tick for ${watcher.login} still running, skipping`);
        continue;
      }
      this.submitted.add(watcher.login);
      void this.pool
        .run(() => watcher.tick())
        .catch((err) => {
          logger.error(`[Scheduler] Tick for ${watcher.login} threw`, errorMeta(err));
        })
        .finally(() => {
          this.submitted.delete(watcher.login);
        });
    }
  }
}
