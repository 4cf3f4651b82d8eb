/**
 * Fixed-size worker pool for per-id fan-out.
 */

export type PoolResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  /** Not started because the signal was aborted */
  | { status: 'skipped' };

/**
 * Map items through an async function with at most `limit` calls in flight.
 *
 * Results are returned in input order. Once `signal` is aborted no new call
 * starts; calls already in flight finish and keep their result.
 *
 * @param items - Work items
 * @param limit - Pool size (at least 1)
 * @param fn - Async work per item
 * @param signal - Optional abort signal
 * @returns One settled result per item
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolResult<R>[]> {
  const results: PoolResult<R>[] = items.map(() => ({ status: 'skipped' }));
  const queue = items.map((item, index) => ({ item, index }));

  const worker = async (): Promise<void> => {
    while (!signal?.aborted) {
      const job = queue.shift();
      if (!job) {
        return;
      }
      try {
        results[job.index] = { status: 'fulfilled', value: await fn(job.item, job.index) };
      } catch (reason) {
        results[job.index] = { status: 'rejected', reason };
      }
    }
  };

  const size = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}
