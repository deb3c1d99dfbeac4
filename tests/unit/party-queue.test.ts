import { describe, it, expect } from 'vitest'
import { createPartyQueue } from '../../src/conversation/party-queue.js'

function deferred() {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('PartyQueue', () => {
  it('should run tasks for the same party one after another', async () => {
    const queue = createPartyQueue()
    const order: string[] = []
    const gate = deferred()

    const first = queue.run('a', async () => {
      order.push('first:start')
      await gate.promise
      order.push('first:end')
    })
    const second = queue.run('a', async () => {
      order.push('second')
    })

    await Promise.resolve()
    gate.resolve()
    await Promise.all([first, second])

    expect(order).toEqual(['first:start', 'first:end', 'second'])
  })

  it('should not hold one party behind another', async () => {
    const queue = createPartyQueue()
    const gate = deferred()

    const blocked = queue.run('a', () => gate.promise)
    const other = await queue.run('b', async () => 'b done')

    expect(other).toBe('b done')
    gate.resolve()
    await blocked
  })

  it('should keep going after a failed task', async () => {
    const queue = createPartyQueue()

    const failed = queue.run('a', async () => {
      throw new Error('boom')
    })
    const next = queue.run('a', async () => 42)

    await expect(failed).rejects.toThrow('boom')
    expect(await next).toBe(42)
  })

  it('should forget a party once its queue drains', async () => {
    const queue = createPartyQueue()

    await queue.run('a', async () => undefined)
    await new Promise((resolve) => setTimeout(resolve, 0))

    expect(queue.pending()).toBe(0)
  })
})
