import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AbortError, ConfigError } from '../../../src/core/errors.js';
import { RateLimiter } from '../../../src/core/rate-limiter.js';

function track(promise: Promise<void>): { settled: () => boolean; error: () => unknown } {
  let settled = false;
  let error: unknown;
  promise.then(
    () => {
      settled = true;
    },
    (err: unknown) => {
      settled = true;
      error = err;
    }
  );
  return { settled: () => settled, error: () => error };
}

describe('core/rate-limiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('constructor', () => {
    it('should derive the interval from requests per minute', () => {
      expect(new RateLimiter({ requestsPerMinute: 30, maxConcurrency: 1 }).intervalMs).toBe(2000);
    });

    it.each([
      [{ requestsPerMinute: 0, maxConcurrency: 1 }],
      [{ requestsPerMinute: -5, maxConcurrency: 1 }],
      [{ requestsPerMinute: 10, maxConcurrency: 0 }],
      [{ requestsPerMinute: 10, maxConcurrency: 1.5 }],
    ])('should reject invalid budget %j', (budget) => {
      expect(() => new RateLimiter(budget)).toThrow(ConfigError);
    });
  });

  describe('acquire', () => {
    it('should grant the first permit immediately', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 2 });
      const first = track(limiter.acquire());

      await vi.advanceTimersByTimeAsync(0);

      expect(first.settled()).toBe(true);
      expect(limiter.activePermits).toBe(1);
    });

    it('should block the N+1th acquire until a permit is released', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 6000, maxConcurrency: 2 });
      await limiter.acquire();
      const second = track(limiter.acquire());
      await vi.advanceTimersByTimeAsync(10);
      expect(second.settled()).toBe(true);

      const third = track(limiter.acquire());
      await vi.advanceTimersByTimeAsync(5000);
      expect(third.settled()).toBe(false);
      expect(limiter.queueLength).toBe(1);

      limiter.release();
      await vi.advanceTimersByTimeAsync(10);

      expect(third.settled()).toBe(true);
      expect(third.error()).toBeUndefined();
      expect(limiter.activePermits).toBe(2);
    });

    it('should wait exactly the remaining interval since the previous grant', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 1 });
      await limiter.acquire();
      limiter.release();

      await vi.advanceTimersByTimeAsync(400);
      const next = track(limiter.acquire());

      await vi.advanceTimersByTimeAsync(599);
      expect(next.settled()).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      expect(next.settled()).toBe(true);
    });

    it('should space out concurrent callers one interval apart', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 3 });
      const start = Date.now();
      const granted: number[] = [];

      const all = Promise.all(
        [0, 1, 2].map(() => limiter.acquire().then(() => granted.push(Date.now() - start)))
      );
      await vi.advanceTimersByTimeAsync(3000);
      await all;

      expect(granted).toEqual([0, 1000, 2000]);
    });

    it('should reject immediately when the signal is already aborted', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 1 });

      await expect(limiter.acquire(AbortSignal.abort())).rejects.toBeInstanceOf(AbortError);
      expect(limiter.activePermits).toBe(0);
    });

    it('should drop a queued waiter on abort without leaking a permit', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 1 });
      await limiter.acquire();
      const controller = new AbortController();
      const waiting = limiter.acquire(controller.signal);

      controller.abort();

      await expect(waiting).rejects.toBeInstanceOf(AbortError);
      expect(limiter.queueLength).toBe(0);
      limiter.release();
      expect(limiter.activePermits).toBe(0);
    });

    it('should hand back the permit when aborted during the interval wait', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 2 });
      await limiter.acquire();
      const controller = new AbortController();
      const waiting = limiter.acquire(controller.signal);
      await vi.advanceTimersByTimeAsync(100);

      controller.abort();
      await expect(waiting).rejects.toBeInstanceOf(AbortError);
      expect(limiter.activePermits).toBe(1);

      // The next caller waits only for the grant that actually happened
      const next = track(limiter.acquire());
      await vi.advanceTimersByTimeAsync(899);
      expect(next.settled()).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      expect(next.settled()).toBe(true);
    });
  });

  describe('cancellation', () => {
    it('should not delay later waiters when a waiter in the middle cancels', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 10 });
      await limiter.acquire();
      const controller = new AbortController();
      const middle = track(limiter.acquire(controller.signal));
      const last = track(limiter.acquire());

      await vi.advanceTimersByTimeAsync(10);
      controller.abort();
      await vi.advanceTimersByTimeAsync(0);
      expect(middle.error()).toBeInstanceOf(AbortError);

      await vi.advanceTimersByTimeAsync(989);
      expect(last.settled()).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      expect(last.settled()).toBe(true);
      expect(last.error()).toBeUndefined();
      expect(limiter.activePermits).toBe(2);
    });

    it('should reject a waiter whose signal aborts as the permit is handed over', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 1 });
      await limiter.acquire();
      await vi.advanceTimersByTimeAsync(1000);
      const controller = new AbortController();
      const waiting = limiter.acquire(controller.signal);

      limiter.release();
      controller.abort();

      await expect(waiting).rejects.toBeInstanceOf(AbortError);
      expect(limiter.activePermits).toBe(0);
      expect(limiter.queueLength).toBe(0);
    });
  });

  describe('release', () => {
    it('should throw when called without a matching acquire', () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 1 });

      expect(() => limiter.release()).toThrow('without a matching acquire');
    });
  });

  describe('withPermit', () => {
    it('should release the permit when the callback throws', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 6000, maxConcurrency: 1 });

      await expect(limiter.withPermit(async () => Promise.reject(new Error('scan failed')))).rejects.toThrow(
        'scan failed'
      );
      expect(limiter.activePermits).toBe(0);
    });

    it('should return the callback result', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 6000, maxConcurrency: 1 });

      await expect(limiter.withPermit(async () => 42)).resolves.toBe(42);
    });
  });

  describe('currentRate', () => {
    it('should count grants in the trailing minute', async () => {
      const limiter = new RateLimiter({ requestsPerMinute: 60, maxConcurrency: 1 });
      await limiter.acquire();
      limiter.release();
      await vi.advanceTimersByTimeAsync(1000);
      await limiter.acquire();
      limiter.release();

      expect(limiter.currentRate()).toBe(2);

      await vi.advanceTimersByTimeAsync(60_000);
      expect(limiter.currentRate()).toBe(0);
    });
  });
});
