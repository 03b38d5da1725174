/**
 * pool.ts — Bounded concurrency for independent async tasks
 *
 * Runs `worker` over `items` with at most `concurrency` in flight
 * (null = all at once). Results keep the input order. Workers are expected
 * to settle on their own; a rejection is rethrown after every started task
 * has finished, so one failure never leaves siblings running unobserved.
 */

export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number | null,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = concurrency === null ? items.length : Math.max(1, concurrency);
  const results = new Array<R>(items.length);
  const errors: unknown[] = [];
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  }

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane());
  await Promise.all(lanes);

  if (errors.length > 0) throw errors[0];
  return results;
}
