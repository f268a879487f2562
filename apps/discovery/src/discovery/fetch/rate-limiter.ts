/**
 * Sliding Window Rate Limiter
 *
 * Bounds outbound calls to the scraping service to N per trailing window
 * (60s by default). One instance is shared by every phase and worker of a
 * discovery run.
 *
 * Callers are served in arrival order: each acquire() waits for the one
 * before it to be granted, then waits for the oldest timestamp in the window
 * to age out if the window is full.
 */

import type { Clock } from '../utils/clock.js'
import { systemClock } from '../utils/clock.js'

export const DEFAULT_WINDOW_MS = 60_000

export interface RateLimiter {
  /**
   * Wait until one more call fits in the window, then record it.
   * Rejects only if the signal aborts while waiting.
   */
  acquire(signal?: AbortSignal): Promise<void>

  /** Snapshot for logging. Never used to gate calls. */
  status(): RateLimitStatus
}

export interface RateLimitStatus {
  maxRequests: number
  inWindow: number
  remaining: number
  /** 0 when a slot is free now */
  secondsUntilNextSlot: number
}

export interface SlidingWindowRateLimiterOptions {
  maxRequests: number
  windowMs?: number
  clock?: Clock
}

export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxRequests: number
  private readonly windowMs: number
  private readonly clock: Clock
  private timestamps: number[] = []
  private tail: Promise<void> = Promise.resolve()

  constructor(options: SlidingWindowRateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`)
    }
    this.maxRequests = options.maxRequests
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS
    this.clock = options.clock ?? systemClock
  }

  acquire(signal?: AbortSignal): Promise<void> {
    const granted = this.tail.then(() => this.waitForSlot(signal))
    // The next caller queues behind this one whether it is granted or aborted
    this.tail = granted.catch(() => undefined)
    return granted
  }

  status(): RateLimitStatus {
    const now = this.clock.now()
    this.prune(now)

    const inWindow = this.timestamps.length
    const remaining = Math.max(0, this.maxRequests - inWindow)
    const secondsUntilNextSlot =
      remaining > 0 ? 0 : Math.max(0, this.timestamps[0] + this.windowMs - now) / 1000

    return {
      maxRequests: this.maxRequests,
      inWindow,
      remaining,
      secondsUntilNextSlot,
    }
  }

  /**
   * Forget recorded calls (between independent runs in tests).
   */
  reset(): void {
    this.timestamps = []
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    while (true) {
      const now = this.clock.now()
      this.prune(now)

      // Check and record happen without an await in between
      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now)
        return
      }

      const retryAfterMs = this.timestamps[0] + this.windowMs - now
      await this.clock.sleep(Math.max(1, retryAfterMs), signal)
    }
  }

  private prune(now: number): void {
    const windowStart = now - this.windowMs
    let expired = 0
    while (expired < this.timestamps.length && this.timestamps[expired] <= windowStart) {
      expired++
    }
    if (expired > 0) {
      this.timestamps = this.timestamps.slice(expired)
    }
  }
}
