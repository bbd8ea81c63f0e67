/**
 * Process `items` with at most `limit` workers in flight. Resolves once every
 * worker has stopped; the first error thrown by a worker is rethrown after
 * the others finish. Workers stop taking new items once `signal` aborts.
 */
export async function runPool<T>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal
): Promise<void> {
  const concurrency = Math.max(1, Math.min(limit, items.length));
  let next = 0;
  const errors: unknown[] = [];

  const runners = Array.from({ length: concurrency }, async () => {
    while (next < items.length && !signal?.aborted && errors.length === 0) {
      const index = next;
      next += 1;
      try {
        await worker(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  });

  await Promise.all(runners);
  if (errors.length > 0) throw errors[0];
}
