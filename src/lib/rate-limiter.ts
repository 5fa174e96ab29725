/**
 * Fixed-window rate limiter shared by every registry call in the process.
 *
 * Check-and-increment and window rollover happen in one synchronous step, so
 * concurrent workers never lose or double count a request at the boundary.
 */

import type { RateLimitStatus } from '../types/registry.ts'
import { systemClock, type Clock } from './clock.ts'
import { RateLimitExceededError, throwIfCancelled } from './errors.ts'

export interface RateLimiterOptions {
  maxRequests: number
  windowMs: number
  /** Longest a caller without its own deadline will wait for budget */
  maxWaitMs?: number
  clock?: Clock
}

export interface AcquireOptions {
  signal?: AbortSignal
  /** Epoch ms; fail with RateLimitExceeded rather than wait past it */
  deadline?: number
}

export class RateLimiter {
  readonly maxRequests: number
  readonly windowMs: number
  private maxWaitMs: number
  private clock: Clock
  private windowStart: number
  private count = 0

  constructor(options: RateLimiterOptions) {
    if (options.maxRequests < 1 || options.windowMs < 1) {
      throw new RangeError('Rate limiter needs at least one request per positive window')
    }
    this.maxRequests = options.maxRequests
    this.windowMs = options.windowMs
    this.maxWaitMs = options.maxWaitMs ?? options.windowMs * 2
    this.clock = options.clock ?? systemClock
    this.windowStart = this.clock.now()
  }

  /** Take one request from the current window if any budget is left */
  tryAcquire(): boolean {
    this.roll()
    if (this.count < this.maxRequests) {
      this.count++
      return true
    }
    return false
  }

  /** Wait for budget; windows are waited out, not failed, unless the deadline would pass */
  async acquire(options: AcquireOptions = {}): Promise<void> {
    const deadline = options.deadline ?? this.clock.now() + this.maxWaitMs

    for (;;) {
      throwIfCancelled(options.signal)
      if (this.tryAcquire()) return

      const resetAt = this.windowStart + this.windowMs
      if (resetAt > deadline) {
        throw new RateLimitExceededError(new Date(resetAt))
      }

      const waitMs = Math.max(resetAt - this.clock.now(), 0)
      console.log(`Rate limit reached (${this.maxRequests}/${this.windowMs}ms), waiting ${waitMs}ms for window reset`)
      await this.clock.sleep(waitMs, options.signal)
    }
  }

  getStatus(): RateLimitStatus {
    this.roll()
    return {
      max_requests: this.maxRequests,
      remaining_requests: this.maxRequests - this.count,
      window_seconds: this.windowMs / 1000,
      reset_at: new Date(this.windowStart + this.windowMs).toISOString(),
    }
  }

  private roll(): void {
    const now = this.clock.now()
    if (now < this.windowStart + this.windowMs) return

    const elapsedWindows = Math.floor((now - this.windowStart) / this.windowMs)
    this.windowStart += elapsedWindows * this.windowMs
    this.count = 0
  }
}
