/**
 * Bounded Concurrency
 *
 * Runs an async task over a list with at most `limit` tasks in flight.
 * Results keep input order.
 */

export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length)
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const current = next
      next += 1
      results[current] = await task(items[current], current)
    }
  }

  const workers = Math.max(1, Math.min(Math.floor(limit), items.length))
  await Promise.all(Array.from({ length: workers }, () => worker()))
  return results
}
