export type PoolOutcome<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown };

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Outcomes come back in input order; one failing item never cancels the rest.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PoolOutcome<R>[]> {
  const outcomes: PoolOutcome<R>[] = new Array(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        outcomes[index] = { status: "fulfilled", value: await worker(items[index], index) };
      } catch (reason) {
        outcomes[index] = { status: "rejected", reason };
      }
    }
  }

  await Promise.all(Array.from({ length: width }, () => lane()));
  return outcomes;
}
