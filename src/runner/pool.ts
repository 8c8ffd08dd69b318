/**
 * Bounded worker pool over an in-memory backlog.
 */

export interface PoolOptions {
  concurrency: number;
  /** Once aborted, workers take no new items */
  signal?: AbortSignal;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Items are taken in order. When a worker call rejects, no further items
 * are started; the pool waits for the calls in flight and then rejects
 * with the first error.
 *
 * @returns Number of items started
 */
export async function runPool<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions
): Promise<number> {
  let next = 0;
  let failed = false;
  let firstError: unknown = null;

  const loop = async () => {
    while (!failed && !options.signal?.aborted && next < items.length) {
      const index = next++;
      try {
        await worker(items[index], index);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
    }
  };

  const size = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  await Promise.all(Array.from({ length: size }, () => loop()));

  if (failed) {
    throw firstError;
  }
  return next;
}
