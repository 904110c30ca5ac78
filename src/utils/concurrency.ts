export interface PoolOptions {
  concurrency: number;
  /** Checked before each item is started; returning false stops new work. */
  shouldContinue?: () => boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Items are
 * claimed by index, so each one starts at most once. Items not started because
 * `shouldContinue` turned false are returned in `skipped`. A worker that throws
 * stops the other lanes from claiming more items; the run rejects with that
 * error once in-flight items have drained.
 */
export const runWithConcurrency = async <T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions
): Promise<{ started: number; skipped: T[] }> => {
  const limit = Math.max(1, Math.min(Math.round(options.concurrency), items.length || 1));
  let cursor = 0;
  let started = 0;
  let stopped = false;
  const failures: unknown[] = [];

  const lane = async (): Promise<void> => {
    while (!stopped && cursor < items.length) {
      if (options.shouldContinue && !options.shouldContinue()) {
        stopped = true;
        return;
      }
      const index = cursor;
      cursor += 1;
      started += 1;
      try {
        await worker(items[index], index);
      } catch (error) {
        stopped = true;
        failures.push(error);
        return;
      }
    }
  };

  await Promise.all(Array.from({ length: limit }, () => lane()));
  if (failures.length > 0) throw failures[0];
  return { started, skipped: items.slice(cursor) };
};
