/**
 * Runs `task` over `items` with at most `limit` tasks in flight and resolves once every
 * task has settled. Results keep input order. If any task rejects, the pool still waits
 * for the remaining workers to drain before rejecting with the first error.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let cursor = 0;

  const worker = async () => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await task(items[index], index);
    }
  };

  const settled = await Promise.allSettled(
    Array.from({ length: items.length === 0 ? 0 : workerCount }, () => worker())
  );
  const failure = settled.find(
    (outcome): outcome is PromiseRejectedResult => outcome.status === "rejected"
  );
  if (failure) {
    throw failure.reason;
  }

  return results;
};
