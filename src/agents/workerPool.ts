/**
 * workerPool.ts — Bounded FIFO pool of job runners.
 *
 * At most `size` tasks run at once; the rest wait in arrival order.  The
 * pool size is the number of simultaneous browsing contexts the portal is
 * allowed to see, so it is set from configuration, never from CPU count.
 */

import { Logger } from '../core/logger';

const logger = new Logger('WorkerPool');

export interface PoolStats {
  size: number;
  running: number;
  queued: number;
  /** Highest `running` seen since the pool was created. */
  peak: number;
}

interface QueuedTask {
  key: string;
  run: () => Promise<void>;
}

export class WorkerPool {
  private readonly queue: QueuedTask[] = [];
  private readonly active = new Set<string>();
  private peak = 0;
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Queue a task under `key`.  The task must handle its own errors; a
   * rejection is logged and the worker moves on.
   */
  push(key: string, run: () => Promise<void>): void {
    if (this.stopped) {
      throw new Error('Worker pool is stopped');
    }
    this.queue.push({ key, run });
    this.drain();
  }

  /** Take a task out of the queue before it starts.  `false` once it is running. */
  remove(key: string): boolean {
    const index = this.queue.findIndex((t) => t.key === key);
    if (index < 0) return false;
    this.queue.splice(index, 1);
    this.notifyIfIdle();
    return true;
  }

  isQueued(key: string): boolean {
    return this.queue.some((t) => t.key === key);
  }

  isRunning(key: string): boolean {
    return this.active.has(key);
  }

  stats(): PoolStats {
    return {
      size: this.size,
      running: this.active.size,
      queued: this.queue.length,
      peak: this.peak,
    };
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Drop queued tasks and stop accepting new ones.  Running tasks finish. */
  stop(): string[] {
    this.stopped = true;
    const dropped = this.queue.splice(0).map((t) => t.key);
    if (dropped.length > 0) logger.info(`Dropped ${dropped.length} queued task(s)`);
    this.notifyIfIdle();
    return dropped;
  }

  // ── Internals ──────────────────────────────────────────

  private drain(): void {
    while (this.active.size < this.size) {
      const task = this.queue.shift();
      if (!task) break;
      this.start(task);
    }
  }

  private start(task: QueuedTask): void {
    this.active.add(task.key);
    this.peak = Math.max(this.peak, this.active.size);
    logger.debug(`Worker picked ${task.key} (${this.active.size}/${this.size} busy)`);

    void task
      .run()
      .catch((err: unknown) => {
        logger.error(`Task ${task.key} escaped with an error`, err);
      })
      .finally(() => {
        this.active.delete(task.key);
        if (!this.stopped) this.drain();
        this.notifyIfIdle();
      });
  }

  private isIdle(): boolean {
    return this.active.size === 0 && this.queue.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
