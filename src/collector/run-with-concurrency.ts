/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Results
 * keep the position of their item. Once `signal` aborts no further item is
 * started; the slots of unstarted items stay undefined.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  const results = new Array<R | undefined>(items.length).fill(undefined);
  let next = 0;

  const workers = new Array(Math.max(1, Math.min(limit, items.length))).fill(0).map(async () => {
    while (!signal?.aborted) {
      const idx = next++;
      if (idx >= items.length) break;
      const item = items[idx];
      if (item !== undefined) {
        results[idx] = await worker(item, idx);
      }
    }
  });

  await Promise.all(workers);
  return results;
}
