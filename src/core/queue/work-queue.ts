import type { WorkSource } from '../../types/index.js'

interface Waiter<T> {
  resolve: (item: T | undefined) => void
  timer: NodeJS.Timeout
}

/**
 * Unbounded FIFO shared by the workers of a run
 *
 * The queue is filled before any worker starts, so a `tryGet` that times out
 * means the queue has been drained for good.
 */
export class WorkQueue<T> implements WorkSource<T> {
  private items: T[] = []
  private waiters: Waiter<T>[] = []

  constructor(initial: Iterable<T> = []) {
    for (const item of initial) {
      this.put(item)
    }
  }

  /**
   * Insert an item; hands it straight to a waiting consumer if there is one
   */
  put(item: T): void {
    const waiter = this.waiters.shift()
    if (waiter) {
      clearTimeout(waiter.timer)
      waiter.resolve(item)
      return
    }
    this.items.push(item)
  }

  /**
   * Remove the next item, or resolve `undefined` if none arrives within `timeoutMs`
   */
  tryGet(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift())
    }

    return new Promise(resolve => {
      const waiter: Waiter<T> = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter)
          resolve(undefined)
        }, Math.max(0, timeoutMs))
      }
      this.waiters.push(waiter)
    })
  }

  /**
   * Number of items not yet taken
   */
  get size(): number {
    return this.items.length
  }

  /**
   * Number of consumers currently waiting for an item
   */
  get waiting(): number {
    return this.waiters.length
  }
}
