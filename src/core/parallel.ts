/**
 * Maps `items` through `worker` with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  async function drain(): Promise<void> {
    while (nextIndex < items.length) {
      const current = nextIndex;
      nextIndex += 1;
      results[current] = await worker(items[current], current);
    }
  }

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  await Promise.all(lanes);
  return results;
}
