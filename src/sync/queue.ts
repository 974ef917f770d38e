/**
 * Bounded FIFO queue connecting the UI loop and the sync worker
 */

export class QueueClosedError extends Error {
  constructor() {
    super('Queue is closed')
    this.name = 'QueueClosedError'
  }
}

export class BoundedQueue<T> {
  private readonly items: T[] = []
  private readonly takers: Array<(item: T | undefined) => void> = []
  private readonly putters: Array<{ item: T; resolve: () => void; reject: (error: Error) => void }> = []
  private closed = false

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`)
    }
  }

  get size(): number {
    return this.items.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Enqueue an item, waiting while the queue is full
   */
  put(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError())
    }

    const taker = this.takers.shift()
    if (taker) {
      taker(item)
      return Promise.resolve()
    }

    if (this.items.length < this.capacity) {
      this.items.push(item)
      return Promise.resolve()
    }

    return new Promise((resolve, reject) => {
      this.putters.push({ item, resolve, reject })
    })
  }

  /**
   * Enqueue without waiting; false when full or closed
   */
  tryPut(item: T): boolean {
    if (this.closed) return false
    const taker = this.takers.shift()
    if (taker) {
      taker(item)
      return true
    }
    if (this.items.length >= this.capacity) return false
    this.items.push(item)
    return true
  }

  /**
   * Dequeue the oldest item, waiting while empty.
   * Resolves to undefined once the queue is closed and drained.
   */
  take(): Promise<T | undefined> {
    const item = this.tryTake()
    if (item !== undefined) {
      return Promise.resolve(item)
    }
    if (this.closed) {
      return Promise.resolve(undefined)
    }
    return new Promise(resolve => {
      this.takers.push(resolve)
    })
  }

  /**
   * Dequeue without waiting
   */
  tryTake(): T | undefined {
    if (this.items.length === 0) return undefined
    const item = this.items.shift()
    const putter = this.putters.shift()
    if (putter) {
      this.items.push(putter.item)
      putter.resolve()
    }
    return item
  }

  /**
   * Drain everything currently queued without waiting
   */
  drain(): T[] {
    const drained: T[] = []
    let item = this.tryTake()
    while (item !== undefined) {
      drained.push(item)
      item = this.tryTake()
    }
    return drained
  }

  /**
   * Stop accepting items; waiting takers get undefined, waiting putters are rejected
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    for (const taker of this.takers.splice(0)) {
      taker(undefined)
    }
    for (const putter of this.putters.splice(0)) {
      putter.reject(new QueueClosedError())
    }
  }
}
