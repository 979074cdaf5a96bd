import { Hono } from 'hono'
import { streamSSE } from 'hono/streaming'
import { assertNever, type FeedEvent } from '@athlete-pulse/types'
import type { EventProcessor } from '../pipeline/processor.js'
import type { FeedHub } from '../pipeline/feed.js'
import { serializeError, type Logger } from '../lib/logger.js'

export interface FeedRoutesOptions {
  processor: EventProcessor
  feed: FeedHub
  logger: Logger
  heartbeatMs: number
}

function eventName(event: FeedEvent): string {
  switch (event.type) {
    case 'athlete_processed':
      return 'athlete'
    case 'snapshot':
      return 'snapshot'
    case 'heartbeat':
      return 'heartbeat'
    default:
      return assertNever(event)
  }
}

/**
 * GET /feed — Server-Sent Events: a snapshot on connect, then every processed
 * athlete and a periodic heartbeat until the client disconnects.
 */
export function feedRoutes({ processor, feed, logger, heartbeatMs }: FeedRoutesOptions) {
  const routes = new Hono()

  routes.get('/', (c) =>
    streamSSE(c, async (stream) => {
      let seq = 0
      // Writes are chained so events reach the client in publish order.
      let pending: Promise<void> = Promise.resolve()
      const send = (event: FeedEvent): void => {
        const id = String(seq++)
        pending = pending
          .then(() => stream.writeSSE({ event: eventName(event), id, data: JSON.stringify(event) }))
          .catch((err: unknown) => {
            logger.warn('feed_write_failed', serializeError(err))
          })
      }

      const closed = new Promise<void>((resolve) => stream.onAbort(() => resolve()))

      send(processor.snapshotEvent())
      const unsubscribe = feed.subscribe(send)
      const heartbeat = setInterval(() => {
        send({
          type: 'heartbeat',
          ts: new Date().toISOString(),
          payload: { subscribers: feed.size },
        })
      }, heartbeatMs)
      heartbeat.unref()

      await closed
      clearInterval(heartbeat)
      unsubscribe()
      await pending
    }),
  )

  return routes
}
