/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight.
 * Items start in input order and results keep input order, whatever order
 * they finish in. A concurrency of 1 runs everything sequentially.
 */
export async function pool<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency = 1
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  }

  await Promise.all(Array.from({ length: limit }, () => worker()));
  return results;
}
