/**
 * Security headers middleware. HSTS is only sent in production.
 */

import type { Context, Next } from 'hono'

export function securityHeaders({ production }: { production: boolean }) {
  return async (c: Context, next: Next): Promise<void> => {
    await next()
    c.header('X-Content-Type-Options', 'nosniff')
    c.header('X-Frame-Options', 'DENY')
    c.header('Referrer-Policy', 'no-referrer')
    if (production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains')
    }
  }
}
