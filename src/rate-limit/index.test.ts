import {describe, it, expect} from 'vitest'
import {createRateLimiter} from './index'

function clock(start = 1_000_000) {
  let t = start
  return {now: () => t, advance: (ms: number) => (t += ms)}
}

describe('createRateLimiter', () => {
  it('allows up to the per-minute limit, then reports when to retry', () => {
    const time = clock()
    const limiter = createRateLimiter({perMinute: 3, perHour: 100, now: time.now})

    for (let i = 0; i < 3; i++) {
      expect(limiter.check('u1')).toEqual({allowed: true})
      time.advance(10_000)
    }

    // First request was 30s ago, so the minute window frees up in 30s
    expect(limiter.check('u1')).toEqual({allowed: false, window: 'minute', limit: 3, retryAfterSeconds: 30})

    time.advance(30_000)
    expect(limiter.check('u1')).toEqual({allowed: true})
  })

  it('enforces the hourly limit across minutes', () => {
    const time = clock()
    const limiter = createRateLimiter({perMinute: 10, perHour: 2, now: time.now})

    expect(limiter.check('u1').allowed).toBe(true)
    time.advance(5 * 60_000)
    expect(limiter.check('u1').allowed).toBe(true)
    time.advance(5 * 60_000)

    expect(limiter.check('u1')).toEqual({allowed: false, window: 'hour', limit: 2, retryAfterSeconds: 50 * 60})
  })

  it('does not count rejected requests', () => {
    const time = clock()
    const limiter = createRateLimiter({perMinute: 1, now: time.now})

    limiter.check('u1')
    for (let i = 0; i < 5; i++) expect(limiter.check('u1').allowed).toBe(false)

    time.advance(60_000)
    expect(limiter.check('u1').allowed).toBe(true)
  })

  it('tracks users independently', () => {
    const limiter = createRateLimiter({perMinute: 1, now: clock().now})

    expect(limiter.check('u1').allowed).toBe(true)
    expect(limiter.check('u2').allowed).toBe(true)
    expect(limiter.check('u1').allowed).toBe(false)

    limiter.reset('u1')
    expect(limiter.check('u1').allowed).toBe(true)
  })
})
