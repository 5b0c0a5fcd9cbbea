/**
 * Run `fn` over `items` with at most `limit` calls in flight. Workers pull
 * from one shared iterator, so a slow item only holds up its own worker.
 */
export async function forEachConcurrent<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<void>,
): Promise<void> {
  const iterator = items.values();
  const workerCount = Math.max(1, Math.min(limit, items.length));

  const workers = Array.from({ length: workerCount }, async () => {
    for (const item of iterator) {
      await fn(item);
    }
  });

  await Promise.all(workers);
}

/** A usable worker count: `value` rounded down, or `fallback` when it is not a positive number. */
export function resolveConcurrency(
  value: number | undefined,
  fallback: number,
): number {
  if (value === undefined || !Number.isFinite(value) || value < 1) {
    return fallback;
  }
  return Math.floor(value);
}
