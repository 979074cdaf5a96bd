import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { EventProcessor } from './pipeline/processor.js'
import type { FeedHub } from './pipeline/feed.js'
import { serializeError, type Logger } from './lib/logger.js'
import { requestLogger } from './lib/request-logger.js'
import { securityHeaders } from './lib/security-headers.js'
import { rateLimit, type RateLimitOptions } from './lib/rate-limit.js'
import { athleteRoutes } from './routes/athletes.js'
import { analyticsRoutes } from './routes/analytics.js'
import { predictionRoutes } from './routes/prediction.js'
import { similarityRoutes } from './routes/similarity.js'
import { markovRoutes } from './routes/markov.js'
import { feedRoutes } from './routes/feed.js'
import { healthRoutes, type HealthCheck } from './routes/health.js'

export interface AppDeps {
  processor: EventProcessor
  feed: FeedHub
  logger: Logger
  checks: HealthCheck
  corsOrigins: string[]
  production: boolean
  heartbeatMs: number
  /** Limit for the POST routes, per client and window. */
  writeLimit?: Pick<RateLimitOptions, 'windowMs' | 'max'>
  now?: () => number
}

export function createApp(deps: AppDeps) {
  const { processor, feed, logger, now = Date.now } = deps
  const writeLimit = deps.writeLimit ?? { windowMs: 60_000, max: 600 }

  const app = new Hono()

  // -------------------------------------------------------------------------
  // Global error handling
  // -------------------------------------------------------------------------

  app.onError((err, c) => {
    const status: ContentfulStatusCode = err instanceof HTTPException ? err.status : 500
    if (status >= 500) {
      logger.error('request_failed', {
        method: c.req.method,
        path: c.req.path,
        ...serializeError(err),
      })
    }
    return c.json({ error: status >= 500 ? 'Internal server error.' : err.message }, status)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // -------------------------------------------------------------------------
  // Middleware stack (order matters)
  // -------------------------------------------------------------------------

  app.use('*', requestLogger(logger))
  app.use(
    '*',
    cors({
      origin: deps.corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )
  app.use('*', securityHeaders({ production: deps.production }))
  app.use('/api/athletes', rateLimit({ ...writeLimit, now }))
  app.use('/api/prediction/*', rateLimit({ ...writeLimit, now }))
  app.use('/api/markov/strategy', rateLimit({ ...writeLimit, now }))

  // -------------------------------------------------------------------------
  // Routes
  // -------------------------------------------------------------------------

  app.route('/health', healthRoutes({ processor, feed, checks: deps.checks }))
  app.route('/feed', feedRoutes({ processor, feed, logger, heartbeatMs: deps.heartbeatMs }))
  app.route('/api/athletes', athleteRoutes({ processor, now }))
  app.route('/api', analyticsRoutes(processor))
  app.route('/api/prediction', predictionRoutes)
  app.route('/api/similarity', similarityRoutes(processor))
  app.route('/api/markov', markovRoutes(processor))

  app.get('/', (c) => c.json({ name: 'athlete-pulse', version: '0.1.0' }))

  return app
}
