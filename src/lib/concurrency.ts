// Bounded worker pool. Results come back in input order whatever the completion order.

export type TaskOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' }   // never started: the signal fired first

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<TaskOutcome<R>[]> {
  const outcomes: TaskOutcome<R>[] = items.map(() => ({ status: 'skipped' }))
  let next = 0

  const worker = async () => {
    while (next < items.length) {
      if (signal?.aborted) return
      const index = next++
      try {
        outcomes[index] = { status: 'fulfilled', value: await task(items[index], index) }
      } catch (reason) {
        outcomes[index] = { status: 'rejected', reason }
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, worker)
  await Promise.all(workers)
  return outcomes
}
