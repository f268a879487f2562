import { describe, it, expect } from 'vitest'
import { SlidingWindowRateLimiter } from '../rate-limiter.js'
import { AbortedError, ManualClock } from '../../utils/clock.js'

describe('SlidingWindowRateLimiter', () => {
  it('grants up to maxRequests immediately', async () => {
    const clock = new ManualClock()
    const limiter = new SlidingWindowRateLimiter({ maxRequests: 3, clock })

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()])

    expect(clock.now()).toBe(0)
    expect(limiter.status()).toEqual({
      maxRequests: 3,
      inWindow: 3,
      remaining: 0,
      secondsUntilNextSlot: 60,
    })
  })

  it('never records more than maxRequests in any trailing window', async () => {
    const clock = new ManualClock()
    const limiter = new SlidingWindowRateLimiter({ maxRequests: 3, clock })
    const granted: number[] = []

    await Promise.all(
      Array.from({ length: 7 }, () => limiter.acquire().then(() => granted.push(clock.now())))
    )

    expect(granted).toEqual([0, 0, 0, 60_000, 60_000, 60_000, 120_000])
    for (const at of granted) {
      const inWindow = granted.filter(other => other > at - 60_000 && other <= at)
      expect(inWindow.length).toBeLessThanOrEqual(3)
    }
  })

  it('reports the wait until the oldest call ages out', async () => {
    const clock = new ManualClock()
    const limiter = new SlidingWindowRateLimiter({ maxRequests: 2, clock })

    await limiter.acquire()
    await limiter.acquire()
    clock.advance(15_000)

    expect(limiter.status()).toEqual({
      maxRequests: 2,
      inWindow: 2,
      remaining: 0,
      secondsUntilNextSlot: 45,
    })

    clock.advance(45_000)
    expect(limiter.status().remaining).toBe(2)
  })

  it('rejects an aborted waiter without blocking the queue', async () => {
    const clock = new ManualClock()
    const limiter = new SlidingWindowRateLimiter({ maxRequests: 1, clock })
    await limiter.acquire()

    const controller = new AbortController()
    controller.abort()

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(AbortedError)
    await limiter.acquire()
    expect(clock.now()).toBe(60_000)
  })

  it('forgets recorded calls on reset', async () => {
    const limiter = new SlidingWindowRateLimiter({ maxRequests: 1, clock: new ManualClock() })
    await limiter.acquire()

    limiter.reset()

    expect(limiter.status().remaining).toBe(1)
  })

  it('rejects a non-positive limit', () => {
    expect(() => new SlidingWindowRateLimiter({ maxRequests: 0 })).toThrow(RangeError)
  })
})
