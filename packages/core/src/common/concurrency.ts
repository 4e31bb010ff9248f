/**
 * Bounded concurrency primitives.
 *
 * Semaphore admits at most `limit` holders; waiters resume in FIFO order.
 * mapSettled runs a task per item through a semaphore and resolves only when
 * every task has settled (join barrier), keeping results in input order.
 */

export class Semaphore {
  private active = 0
  private readonly queue: Array<() => void> = []

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`)
    }
  }

  get inUse(): number {
    return this.active
  }

  acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active++
      return Promise.resolve()
    }
    return new Promise(resolve => this.queue.push(() => { this.active++; resolve() }))
  }

  release(): void {
    this.active--
    const next = this.queue.shift()
    if (next) next()
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }
}

export type Settled<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown }

export async function mapSettled<I, T>(
  items: readonly I[],
  limit: number,
  task: (item: I, index: number) => Promise<T>,
): Promise<Settled<T>[]> {
  const semaphore = new Semaphore(limit)
  return Promise.all(
    items.map(async (item, index): Promise<Settled<T>> => {
      try {
        const value = await semaphore.run(() => task(item, index))
        return { status: 'fulfilled', value }
      } catch (reason) {
        return { status: 'rejected', reason }
      }
    }),
  )
}
