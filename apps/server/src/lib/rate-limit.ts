/**
 * In-memory fixed-window rate limiter for the ingest and simulation routes.
 * Each limiter keeps its own counters, keyed by client address.
 */

import type { Context, Next } from 'hono'

export interface RateLimitOptions {
  /** Window length in milliseconds. */
  windowMs: number
  /** Requests allowed per key per window. */
  max: number
  /** Defaults to the first x-forwarded-for address. */
  keyFn?: (c: Context) => string
  now?: () => number
}

interface Window {
  count: number
  resetAt: number
}

const SWEEP_INTERVAL_MS = 5 * 60 * 1000

function clientKey(c: Context): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown'
}

export function rateLimit({ windowMs, max, keyFn = clientKey, now = Date.now }: RateLimitOptions) {
  const windows = new Map<string, Window>()

  setInterval(() => {
    const t = now()
    for (const [key, w] of windows) {
      if (t > w.resetAt) windows.delete(key)
    }
  }, SWEEP_INTERVAL_MS).unref()

  return async (c: Context, next: Next): Promise<Response | void> => {
    const key = keyFn(c)
    const t = now()
    const current = windows.get(key)

    if (current === undefined || t > current.resetAt) {
      windows.set(key, { count: 1, resetAt: t + windowMs })
      return next()
    }

    if (current.count >= max) {
      c.header('Retry-After', String(Math.ceil((current.resetAt - t) / 1000)))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    current.count++
    return next()
  }
}
