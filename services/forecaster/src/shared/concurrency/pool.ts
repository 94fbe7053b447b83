/**
 * Worker Pool
 * N async workers draining a shared index queue. Results come back in input
 * order and every item settles on its own.
 */

export type PoolWorker<T, R> = (item: T, index: number) => Promise<R>;

export async function runWorkerPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: PoolWorker<T, R>
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  async function drain(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: "fulfilled", value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  await Promise.all(workers);
  return results;
}
