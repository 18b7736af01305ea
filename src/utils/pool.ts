/**
 * Bounded worker pool.
 *
 * At most `limit` workers run at once; a slot is refilled FIFO as soon as a
 * worker settles. `shouldStop` is consulted before each item is started, so
 * a cancellation stops new work without touching work already in flight.
 */
export interface PoolOptions<T> {
  limit: number;
  shouldStop?: () => boolean;
  onSettled?: (item: T, index: number) => void;
  onSkipped?: (item: T, index: number) => void;
}

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  opts: PoolOptions<T>,
): Promise<Array<PromiseSettledResult<R> | undefined>> {
  if (opts.limit < 1) {
    throw new Error('limit must be >= 1');
  }

  const results: Array<PromiseSettledResult<R> | undefined> = new Array(items.length).fill(undefined);
  // One iterator shared by every slot hands out each index exactly once
  const queue = items.entries();

  const drain = async (): Promise<void> => {
    for (const [index, item] of queue) {
      if (opts.shouldStop?.()) {
        opts.onSkipped?.(item, index);
        continue;
      }
      try {
        results[index] = { status: 'fulfilled', value: await worker(item, index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
      opts.onSettled?.(item, index);
    }
  };

  const slots = Math.min(opts.limit, items.length);
  await Promise.all(Array.from({ length: slots }, () => drain()));
  return results;
}
