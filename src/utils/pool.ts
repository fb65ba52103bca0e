/**
 * Run `worker` over `items` with at most `limit` in flight, starting items in
 * order. Once `shouldStop` returns true, or a worker throws, no further item is
 * started; items already running are awaited before the pool settles. The
 * first worker error is rethrown after that. Resolves with the started items.
 */
export async function runPool<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>,
  shouldStop: () => boolean = () => false,
): Promise<T[]> {
  const started: T[] = [];
  const errors: unknown[] = [];
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length && errors.length === 0 && !shouldStop()) {
      const item = items[next++];
      started.push(item);
      try {
        await worker(item);
      } catch (err) {
        errors.push(err);
      }
    }
  }

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  if (errors.length > 0) throw errors[0];
  return started;
}
