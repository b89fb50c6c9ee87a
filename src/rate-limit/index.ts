/**
 * Per-user request limiter
 *
 * Two sliding windows (one minute, one hour) over in-memory request
 * timestamps. A request counts only when it is allowed.
 */

import {Log} from '../util/log'

const log = Log.create({service: 'rate-limit'})

const MINUTE_MS = 60_000
const HOUR_MS = 60 * MINUTE_MS

export type RateLimitWindow = 'minute' | 'hour'

export type RateLimitDecision =
  | {allowed: true}
  | {allowed: false; window: RateLimitWindow; limit: number; retryAfterSeconds: number}

export interface RateLimiter {
  check(userId: string): RateLimitDecision
  reset(userId?: string): void
}

export interface RateLimiterOptions {
  perMinute?: number
  perHour?: number
  /** Clock in epoch milliseconds */
  now?: () => number
}

export function createRateLimiter(options: RateLimiterOptions = {}): RateLimiter {
  const windows: Array<{window: RateLimitWindow; ms: number; limit: number}> = [
    {window: 'minute', ms: MINUTE_MS, limit: options.perMinute ?? 20},
    {window: 'hour', ms: HOUR_MS, limit: options.perHour ?? 100},
  ]
  const now = options.now ?? Date.now
  const requests = new Map<string, number[]>()

  return {
    check(userId) {
      const at = now()
      // Only the hour window's worth of history matters
      const timestamps = (requests.get(userId) ?? []).filter((t) => t > at - HOUR_MS)

      for (const {window, ms, limit} of windows) {
        const inWindow = timestamps.filter((t) => t > at - ms)
        if (inWindow.length >= limit) {
          requests.set(userId, timestamps)
          const retryAfterSeconds = Math.max(1, Math.ceil((inWindow[0] + ms - at) / 1000))
          log.warn('rate limit exceeded', {userId, window, limit, retryAfterSeconds})
          return {allowed: false, window, limit, retryAfterSeconds}
        }
      }

      timestamps.push(at)
      requests.set(userId, timestamps)
      return {allowed: true}
    },

    reset(userId) {
      if (userId === undefined) requests.clear()
      else requests.delete(userId)
    },
  }
}
