/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Results are
 * written back by original index, so completion order never leaks into the output.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const settled: Array<{ index: number; value: R }> = [];
  let cursor = 0;

  const lane = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      settled.push({ index, value: await worker(items[index], index) });
    }
  };

  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => lane());
  await Promise.all(lanes);

  return settled.sort((a, b) => a.index - b.index).map(({ value }) => value);
};
