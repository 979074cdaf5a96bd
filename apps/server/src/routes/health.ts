import { Hono } from 'hono'
import type { EventProcessor } from '../pipeline/processor.js'
import type { FeedHub } from '../pipeline/feed.js'

export type CheckStatus = 'ok' | 'error' | 'disabled'

/** Named dependency checks, e.g. `{ redis: 'ok' }`. */
export type HealthCheck = () => Promise<Record<string, CheckStatus>>

export interface HealthRoutesOptions {
  processor: EventProcessor
  feed: FeedHub
  checks: HealthCheck
}

export function healthRoutes({ processor, feed, checks }: HealthRoutesOptions) {
  const routes = new Hono()

  /** GET /health — dependency status plus pipeline counters */
  routes.get('/', async (c) => {
    const results = await checks()
    const healthy = Object.values(results).every((v) => v !== 'error')
    return c.json(
      {
        status: healthy ? 'healthy' : 'degraded',
        checks: results,
        processed: processor.processed,
        subscribers: feed.size,
      },
      healthy ? 200 : 503,
    )
  })

  return routes
}
