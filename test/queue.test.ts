import { describe, it, expect } from 'vitest'
import { EventQueue } from '../src/queue'

describe('EventQueue', () => {
  it('should deliver items in push order', async () => {
    const queue = new EventQueue<number>()
    queue.push(1)
    queue.push(2)
    queue.push(3)

    expect(queue.size).toBe(3)
    expect(await queue.next()).toEqual({ value: 1, done: false })
    expect(await queue.next()).toEqual({ value: 2, done: false })
    expect(await queue.next()).toEqual({ value: 3, done: false })
    expect(queue.size).toBe(0)
  })

  it('should resume a suspended consumer on push', async () => {
    const queue = new EventQueue<string>()
    const pending = queue.next()

    queue.push('a')

    expect(await pending).toEqual({ value: 'a', done: false })
    expect(queue.size).toBe(0)
  })

  it('should drain queued items after close and refuse new ones', async () => {
    const queue = new EventQueue<number>()
    queue.push(1)
    queue.close()

    expect(queue.push(2)).toBe(false)
    expect(queue.isClosed).toBe(true)
    expect(await queue.next()).toEqual({ value: 1, done: false })
    expect(await queue.next()).toEqual({ value: undefined, done: true })
  })

  it('should finish a waiting consumer on close', async () => {
    const queue = new EventQueue<number>()
    const pending = queue.next()

    queue.close()

    expect(await pending).toEqual({ value: undefined, done: true })
  })

  it('should reject a second concurrent consumer', async () => {
    const queue = new EventQueue<number>()
    const first = queue.next()

    await expect(queue.next()).rejects.toThrow('EventQueue supports a single consumer')

    queue.push(9)
    expect(await first).toEqual({ value: 9, done: false })
  })

  it('should be consumable with for await', async () => {
    const queue = new EventQueue<number>()
    queue.push(1)
    queue.push(2)
    queue.close()

    const seen: number[] = []
    for await (const item of queue) seen.push(item)

    expect(seen).toEqual([1, 2])
    expect(() => queue[Symbol.asyncIterator]()).toThrow('EventQueue supports a single consumer')
  })

  it('should keep order across internal compaction', async () => {
    const queue = new EventQueue<number>()
    for (let i = 0; i < 200; i++) queue.push(i)

    for (let i = 0; i < 150; i++) {
      expect((await queue.next()).value).toBe(i)
    }

    expect(queue.size).toBe(50)
    expect(await queue.next()).toEqual({ value: 150, done: false })
  })
})
