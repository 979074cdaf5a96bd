import { Hono } from 'hono'
import type { EventProcessor } from '../pipeline/processor.js'

/** GET /api/analytics/summary and GET /api/streaming/stats */
export function analyticsRoutes(processor: EventProcessor) {
  const routes = new Hono()

  routes.get('/analytics/summary', (c) => c.json(processor.analyticsSummary()))

  routes.get('/streaming/stats', (c) => c.json(processor.streamingStats()))

  return routes
}
