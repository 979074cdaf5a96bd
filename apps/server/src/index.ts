import { serve } from '@hono/node-server'
import { createCache, createRedisClient, createTimeline, redisHealthCheck } from '@athlete-pulse/cache'
import { createApp } from './app.js'
import { loadEnv } from './lib/env.js'
import { createLogger, serializeError } from './lib/logger.js'
import { FeedHub } from './pipeline/feed.js'
import { EventProcessor } from './pipeline/processor.js'
import { createTimelinePoller } from './pipeline/poller.js'
import { publishSnapshot } from './pipeline/snapshots.js'

const env = loadEnv()
const logger = createLogger({ level: env.LOG_LEVEL, bindings: { service: 'athlete-pulse' } })

const feed = new FeedHub(logger.child({ component: 'feed' }))
const processor = new EventProcessor({
  config: env.engine,
  feed,
  logger: logger.child({ component: 'processor' }),
})

// ---------------------------------------------------------------------------
// Redis: snapshot cache plus a second connection for the blocking timeline pop
// ---------------------------------------------------------------------------

const redis = env.REDIS_ENABLED ? createRedisClient(env.REDIS_URL) : null
const cache = redis === null ? undefined : createCache(redis)
const timelineClient = redis === null ? null : redis.duplicate()
const poller =
  timelineClient === null
    ? null
    : createTimelinePoller({
        timeline: createTimeline(timelineClient),
        processor,
        logger: logger.child({ component: 'poller' }),
        timeoutSeconds: env.TIMELINE_POLL_TIMEOUT,
      })

const polling = poller?.run().catch((err: unknown) => {
  logger.error('timeline_poller_crashed', serializeError(err))
})

const snapshots = setInterval(() => {
  publishSnapshot({ processor, feed, cache, ttlSeconds: env.ANALYTICS_TTL }).catch((err: unknown) => {
    logger.error('snapshot_failed', serializeError(err))
  })
}, env.ANALYTICS_UPDATE_INTERVAL * 1000)

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

const app = createApp({
  processor,
  feed,
  logger,
  corsOrigins: env.CORS_ORIGINS,
  production: env.NODE_ENV === 'production',
  heartbeatMs: env.HEARTBEAT_INTERVAL * 1000,
  checks: async () => ({
    redis: redis === null ? 'disabled' : (await redisHealthCheck(redis)) ? 'ok' : 'error',
  }),
})

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info('server_started', {
    port: info.port,
    env: env.NODE_ENV,
    redis: env.REDIS_ENABLED,
    states: env.engine.markovStates,
  })
})

// ---------------------------------------------------------------------------
// Graceful shutdown
// ---------------------------------------------------------------------------

async function closeBackground(): Promise<void> {
  clearInterval(snapshots)
  poller?.stop()
  // The pop in flight returns within TIMELINE_POLL_TIMEOUT.
  await polling
  await Promise.all([redis?.quit(), timelineClient?.quit()])
}

function shutdown(signal: string): void {
  logger.info('shutdown', { signal, processed: processor.processed })

  server.close(() => {
    closeBackground().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown_failed', serializeError(err))
        process.exit(1)
      },
    )
  })
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
