import { describe, it, expect } from 'vitest'
import { BoundedQueue, QueueClosedError } from '../../src/sync/queue'

describe('BoundedQueue', () => {
  it('should reject a capacity below one', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError)
    expect(() => new BoundedQueue<number>(1.5)).toThrow(RangeError)
  })

  it('should deliver items in FIFO order', async () => {
    const queue = new BoundedQueue<number>(4)
    await queue.put(1)
    await queue.put(2)
    await queue.put(3)

    expect(await queue.take()).toBe(1)
    expect(queue.tryTake()).toBe(2)
    expect(queue.drain()).toEqual([3])
    expect(queue.size).toBe(0)
  })

  it('should never block on tryTake', () => {
    const queue = new BoundedQueue<string>(2)
    expect(queue.tryTake()).toBeUndefined()
  })

  it('should make a taker wait until an item arrives', async () => {
    const queue = new BoundedQueue<string>(1)
    const pending = queue.take()
    await queue.put('late')
    expect(await pending).toBe('late')
  })

  it('should make put wait while the queue is full', async () => {
    const queue = new BoundedQueue<number>(1)
    await queue.put(1)

    let secondDone = false
    const second = queue.put(2).then(() => {
      secondDone = true
    })

    await Promise.resolve()
    expect(secondDone).toBe(false)
    expect(queue.tryPut(3)).toBe(false)

    expect(queue.tryTake()).toBe(1)
    await second
    expect(secondDone).toBe(true)
    expect(queue.tryTake()).toBe(2)
  })

  it('should wake waiting takers with undefined on close', async () => {
    const queue = new BoundedQueue<number>(2)
    const pending = queue.take()
    queue.close()
    expect(await pending).toBeUndefined()
  })

  it('should reject waiting and new putters once closed', async () => {
    const queue = new BoundedQueue<number>(1)
    await queue.put(1)
    const waiting = queue.put(2)
    queue.close()

    await expect(waiting).rejects.toBeInstanceOf(QueueClosedError)
    await expect(queue.put(3)).rejects.toBeInstanceOf(QueueClosedError)
    expect(queue.tryPut(4)).toBe(false)
  })

  it('should still hand out queued items after close', async () => {
    const queue = new BoundedQueue<number>(2)
    await queue.put(7)
    queue.close()

    expect(queue.isClosed).toBe(true)
    expect(await queue.take()).toBe(7)
    expect(await queue.take()).toBeUndefined()
  })
})
