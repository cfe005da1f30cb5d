import { throwIfAborted } from './utils.js';

/**
 * Process items with at most `size` workers pulling from a shared queue.
 *
 * Workers stop taking new items once the signal fires. Every started worker
 * is awaited before this settles; the first error (if any) is rethrown.
 */
export async function runWorkerPool<T>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  let next = 0;
  const count = Math.max(1, Math.min(size, items.length));

  const workers = Array.from({ length: count }, async () => {
    while (next < items.length) {
      throwIfAborted(signal);
      const index = next++;
      await worker(items[index], index);
    }
  });

  const results = await Promise.allSettled(workers);
  const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failure) {
    throw failure.reason;
  }
}
