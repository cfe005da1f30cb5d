/**
 * Rate Limiter - concurrency permits plus minimum spacing between grants
 *
 * acquire() first takes a permit (FIFO), then waits until one interval
 * (60000 / requestsPerMinute ms) has passed since the previous grant.
 * Nothing is booked ahead: each waiter re-checks the last actual grant after
 * waking, so a cancelled waiter never delays the ones behind it.
 */

import { RateBudget } from '../types.js';
import { AbortError, ConfigError } from './errors.js';
import { sleep } from './utils.js';

const RATE_WINDOW_MS = 60_000;

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class RateLimiter {
  readonly intervalMs: number;
  private available: number;
  private readonly waiters: Waiter[] = [];
  private lastGrant = Number.NEGATIVE_INFINITY;
  private readonly grants: number[] = [];

  constructor(
    private readonly budget: RateBudget,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isFinite(budget.requestsPerMinute) || budget.requestsPerMinute <= 0) {
      throw new ConfigError(`requestsPerMinute must be positive, got ${budget.requestsPerMinute}`);
    }
    if (!Number.isInteger(budget.maxConcurrency) || budget.maxConcurrency < 1) {
      throw new ConfigError(`maxConcurrency must be at least 1, got ${budget.maxConcurrency}`);
    }
    this.intervalMs = RATE_WINDOW_MS / budget.requestsPerMinute;
    this.available = budget.maxConcurrency;
  }

  get activePermits(): number {
    return this.budget.maxConcurrency - this.available;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortError();
    }

    await this.takePermit(signal);

    try {
      if (signal?.aborted) {
        throw new AbortError();
      }
      let wait = this.lastGrant + this.intervalMs - this.now();
      while (wait > 0) {
        await sleep(wait, signal);
        wait = this.lastGrant + this.intervalMs - this.now();
      }
    } catch (error) {
      this.release();
      throw error;
    }

    this.lastGrant = this.now();
    this.recordGrant(this.lastGrant);
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      this.detach(next);
      next.resolve();
      return;
    }
    if (this.available >= this.budget.maxConcurrency) {
      throw new Error('RateLimiter.release() called without a matching acquire()');
    }
    this.available++;
  }

  async withPermit<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Grants in the trailing minute. Informational; never used for admission.
   */
  currentRate(): number {
    const cutoff = this.now() - RATE_WINDOW_MS;
    return this.grants.filter((ts) => ts > cutoff).length;
  }

  private takePermit(signal?: AbortSignal): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          reject(new AbortError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }

  private recordGrant(ts: number): void {
    this.grants.push(ts);
    const limit = Math.max(1, Math.ceil(this.budget.requestsPerMinute));
    while (this.grants.length > limit) {
      this.grants.shift();
    }
  }
}
