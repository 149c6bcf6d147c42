/**
 * Maps `items` through `task` with at most `limit` tasks in flight. Results
 * keep input order regardless of completion order.
 */
export async function mapWithConcurrency<Item, Result>(
  items: readonly Item[],
  limit: number,
  task: (item: Item, index: number) => Promise<Result>,
): Promise<Result[]> {
  const results = new Array<Result>(items.length);
  const queue = items.entries();
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));

  const workers = Array.from({ length: workerCount }, async () => {
    for (const [index, item] of queue) {
      results[index] = await task(item, index);
    }
  });

  await Promise.all(workers);
  return results;
}
