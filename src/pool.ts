/**
 * Bounded worker pool. Workers pull the next index from a shared cursor; once
 * `signal` is aborted no new item is started and in-flight ones finish.
 * Returns the indices that were never started.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<number[]> {
  let cursor = 0;
  const width = Math.max(1, Math.min(concurrency, items.length));

  const lane = async (): Promise<void> => {
    while (cursor < items.length && !signal?.aborted) {
      const index = cursor++;
      await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: width }, lane));

  const skipped: number[] = [];
  for (let i = cursor; i < items.length; i++) skipped.push(i);
  return skipped;
}
