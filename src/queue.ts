/**
 * Unbounded FIFO queue with any number of producers and exactly one consumer.
 *
 * Producers `push` synchronously; the consumer pulls with `next()` or a
 * `for await` loop, suspending while the queue is empty. Closing the queue
 * lets the consumer drain what is already queued and then finish.
 */
export class EventQueue<T> implements AsyncIterable<T> {
  private items: T[] = []
  private head = 0
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null
  private closed = false
  private consuming = false

  get size(): number {
    return this.items.length - this.head
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Appends an item, waking the consumer if it is suspended.
   * @returns `false` when the queue is closed and the item was not accepted.
   */
  push(item: T): boolean {
    if (this.closed) return false

    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: item, done: false })
      return true
    }

    this.items.push(item)
    return true
  }

  /**
   * Resolves with the next item, or `done` once the queue is closed and empty.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this.waiting) {
      return Promise.reject(new Error('EventQueue supports a single consumer'))
    }

    if (this.size > 0) {
      const item = this.items[this.head]
      this.head++
      this.compact()
      return Promise.resolve({ value: item, done: false })
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }

    return new Promise(resolve => {
      this.waiting = resolve
    })
  }

  /** Stops accepting items. Queued items are still delivered. */
  close(): void {
    if (this.closed) return
    this.closed = true

    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: undefined, done: true })
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.consuming) {
      throw new Error('EventQueue supports a single consumer')
    }
    this.consuming = true

    return {
      next: () => this.next()
    }
  }

  private compact(): void {
    // Drop consumed slots once they dominate the backing array
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
  }
}
