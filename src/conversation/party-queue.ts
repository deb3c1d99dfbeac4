/**
 * Runs tasks one at a time per key. Tasks for different keys run concurrently.
 * A rejected task does not block the ones queued after it.
 */
export interface PartyQueue {
  run<T>(partyId: string, task: () => Promise<T>): Promise<T>
  pending(): number
}

export function createPartyQueue(): PartyQueue {
  const tails = new Map<string, Promise<unknown>>()

  function run<T>(partyId: string, task: () => Promise<T>): Promise<T> {
    const previous = tails.get(partyId) ?? Promise.resolve()
    const next = previous
      .catch(() => undefined)
      .then(task)

    const tail = next.catch(() => undefined)
    tails.set(partyId, tail)
    void tail.then(() => {
      if (tails.get(partyId) === tail) {
        tails.delete(partyId)
      }
    })

    return next
  }

  function pending(): number {
    return tails.size
  }

  return { run, pending }
}
