/**
 * Time source for the pipeline. Tests swap in a manual clock so rate limiting
 * and deadlines never wait in real time.
 */
export interface Clock {
  now(): number
  /** Resolves after ms; rejects with the signal's reason if aborted first */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortedError'
  }
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortedError())
        return
      }
      const onAbort = () => {
        clearTimeout(timer)
        reject(new AbortedError())
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }, Math.max(0, ms))
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  },
}

/**
 * Deterministic clock: sleep() advances time instead of waiting.
 */
export class ManualClock implements Clock {
  private current: number

  constructor(start = 0) {
    this.current = start
  }

  now(): number {
    return this.current
  }

  advance(ms: number): void {
    this.current += ms
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new AbortedError()
    }
    this.current += Math.max(0, ms)
  }
}
