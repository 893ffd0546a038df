/**
 * Bounded worker pool.
 *
 * Runs a task per item with at most `concurrency` tasks in flight. Unlike
 * fixed-size batches, a slow item never holds back the next one: each worker
 * pulls the next index as soon as it finishes.
 */

/**
 * Run `task` for every item with bounded parallelism.
 *
 * Results are returned in input order. A rejected task rejects the whole
 * call; tasks that must not fail the batch should catch their own errors.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (concurrency < 1) {
    throw new Error(`concurrency must be at least 1 (got ${concurrency})`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await task(item, index);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}
