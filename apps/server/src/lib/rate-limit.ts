/**
 * In-memory fixed-window rate limiter middleware for Hono.
 *
 * Each limiter keeps its own counters, so route groups are throttled
 * independently.
 */

import type { Context, Next } from 'hono'

interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to client IP. */
  keyFn?: (c: Context) => string
}

interface Entry {
  count: number
  resetAt: number
}

const SWEEP_INTERVAL_MS = 5 * 60 * 1000

export function rateLimit(config: RateLimitConfig) {
  const store = new Map<string, Entry>()
  let nextSweep = Date.now() + SWEEP_INTERVAL_MS

  // Expired entries are dropped on the first request after each sweep interval
  function sweep(now: number): void {
    if (now < nextSweep) return
    for (const [key, entry] of store) {
      if (now > entry.resetAt) store.delete(key)
    }
    nextSweep = now + SWEEP_INTERVAL_MS
  }

  return async (c: Context, next: Next): Promise<Response | void> => {
    const key =
      config.keyFn?.(c) ??
      c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ??
      'unknown'

    const now = Date.now()
    sweep(now)
    const entry = store.get(key)

    if (!entry || now > entry.resetAt) {
      store.set(key, { count: 1, resetAt: now + config.windowMs })
      return next()
    }

    if (entry.count >= config.max) {
      c.header('Retry-After', String(Math.ceil((entry.resetAt - now) / 1000)))
      return c.json(
        { error: 'Too many requests. Please try again later.' },
        429,
      )
    }

    entry.count++
    return next()
  }
}
