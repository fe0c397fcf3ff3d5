/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 * Results keep the order of `items`.
 *
 * When a task rejects, no further items are started; tasks already running
 * are awaited, then the first error is rethrown.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got ${String(concurrency)}`);
  }

  const results = new Array<R>(items.length);
  // Shared by every worker, so each item is handed out once.
  const pending = items.entries();
  const state: { failure?: { error: unknown } } = {};

  const worker = async (): Promise<void> => {
    for (const [index, item] of pending) {
      if (state.failure) return;
      try {
        results[index] = await task(item, index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  };

  const width = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: width }, () => worker()));

  if (state.failure) throw state.failure.error;
  return results;
}
