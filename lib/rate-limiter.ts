/**
 * Request Throttler
 *
 * Spaces out calls to an external data provider so that two requests never
 * start closer together than `minIntervalMs`. Requests start in the order
 * they were scheduled; a failing request does not hold up the ones behind it.
 */

import { debug } from './logger';
import { sleep } from './utils';

export interface ThrottlerOptions {
  /** Minimum gap between request starts. 0 disables throttling. */
  minIntervalMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ThrottlerStats {
  started: number;
  delayed: number;
  totalDelayMs: number;
}

export const DEFAULT_MIN_INTERVAL_MS = 200;

export class RequestThrottler {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  private tail: Promise<void> = Promise.resolve();
  private lastStartAt: number | null = null;
  private stats: ThrottlerStats = { started: 0, delayed: 0, totalDelayMs: 0 };

  constructor(options: ThrottlerOptions = {}) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS);
    this.now = options.now ?? Date.now;
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Run `task` once its turn comes up
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const turn = this.tail.then(() => this.takeSlot());
    this.tail = turn;
    return turn.then(task);
  }

  getStats(): ThrottlerStats {
    return { ...this.stats };
  }

  private async takeSlot(): Promise<void> {
    if (this.lastStartAt !== null && this.minIntervalMs > 0) {
      const delay = this.lastStartAt + this.minIntervalMs - this.now();
      if (delay > 0) {
        debug('Throttling provider request', { delayMs: delay });
        this.stats.delayed++;
        this.stats.totalDelayMs += delay;
        await this.wait(delay);
      }
    }
    this.lastStartAt = this.now();
    this.stats.started++;
  }
}
