/**
 * rateLimiter.ts — Per-host navigation spacing.
 *
 * The worker-pool size bounds how many browsing contexts exist; this limiter
 * additionally spaces the page loads those contexts issue against the same
 * host, so that several workers logging in at once do not hit the portal in
 * a single burst.
 */

import Bottleneck from 'bottleneck';
import { Logger } from '../core/logger';

const logger = new Logger('RateLimiter');

export interface RateLimiterOptions {
  /** Minimum time between two navigations to the same host. */
  minTimeMs: number;
  /** Navigations allowed in flight per host. */
  maxConcurrent?: number;
}

export class HostRateLimiter {
  private readonly limiters = new Map<string, Bottleneck>();

  constructor(private readonly options: RateLimiterOptions) {}

  /** Run `task` once the host of `url` has a free slot. */
  schedule<T>(url: string, task: () => Promise<T>): Promise<T> {
    return this.forHost(hostOf(url)).schedule(task);
  }

  /** Number of hosts with a live limiter. */
  get size(): number {
    return this.limiters.size;
  }

  /** Drop every limiter.  Queued navigations are rejected by Bottleneck. */
  async stop(): Promise<void> {
    const pending = [...this.limiters.values()].map((l) =>
      l.stop({ dropWaitingJobs: true }),
    );
    this.limiters.clear();
    await Promise.all(pending);
  }

  private forHost(hostname: string): Bottleneck {
    const existing = this.limiters.get(hostname);
    if (existing) return existing;

    logger.debug(`New limiter for ${hostname} (${this.options.minTimeMs} ms spacing)`);
    const limiter = new Bottleneck({
      maxConcurrent: this.options.maxConcurrent ?? 1,
      minTime: this.options.minTimeMs,
    });
    this.limiters.set(hostname, limiter);
    return limiter;
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    logger.debug(`Unparseable URL "${url}" shares the fallback limiter`);
    return '(unknown)';
  }
}
