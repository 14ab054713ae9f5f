/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight.
 *
 * Workers pull from one shared iterator, so each item is handled exactly once.
 * `fn` is expected to catch its own errors; a rejection aborts the pool.
 */
export async function forEachBounded<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<void>,
): Promise<void> {
  const requested = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const limit = Math.max(1, Math.min(requested, items.length));
  const iterator = items.entries();

  const worker = async (): Promise<void> => {
    for (const [index, item] of iterator) {
      await fn(item, index);
    }
  };

  await Promise.all(Array.from({ length: limit }, () => worker()));
}
