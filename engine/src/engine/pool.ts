/**
 * Runs `worker` over `items` with at most `limit` in flight. Every item is attempted even
 * when one rejects; the first rejection is rethrown once all of them have settled.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  let cursor = 0;
  const failures: unknown[] = [];

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (cursor < items.length) {
      const item = items[cursor];
      cursor += 1;
      try {
        await worker(item);
      } catch (error) {
        failures.push(error);
      }
    }
  });

  await Promise.all(lanes);
  if (failures.length > 0) {
    throw failures[0];
  }
}
