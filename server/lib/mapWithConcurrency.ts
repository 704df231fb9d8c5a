export type Settled<R> = R | { error: unknown };

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep input order; a rejected item becomes `{ error }` instead of
 * failing the batch. `onSettled` fires synchronously after each item, which
 * makes it the place to bump progress counters.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: Settled<R>, index: number, item: T) => void,
): Promise<Array<Settled<R>>> {
  if (items.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(items.length, Math.floor(Number(concurrency)) || 1));
  const results = new Array<Settled<R>>(items.length);
  let cursor = 0;

  async function runOneWorker(): Promise<void> {
    while (cursor < items.length) {
      const currentIndex = cursor;
      cursor += 1;
      const item = items[currentIndex];
      try {
        results[currentIndex] = await worker(item, currentIndex);
      } catch (err: unknown) {
        results[currentIndex] = { error: err };
      } finally {
        if (typeof onSettled === 'function') {
          try {
            onSettled(results[currentIndex], currentIndex, item);
          } catch (err: unknown) {
            console.warn(`[concurrency] onSettled threw: ${err instanceof Error ? err.message : String(err)}`);
          }
        }
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}

export function isSettledError<R>(value: Settled<R>): value is { error: unknown } {
  return typeof value === 'object' && value !== null && 'error' in value && Object.keys(value).length === 1;
}
