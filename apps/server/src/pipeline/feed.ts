import type { FeedEvent } from '@athlete-pulse/types'
import { serializeError, type Logger } from '../lib/logger.js'

export type FeedListener = (event: FeedEvent) => void

/**
 * Fan-out of live feed events to the connected subscribers. A listener that
 * throws is dropped.
 */
export class FeedHub {
  private readonly listeners = new Set<FeedListener>()

  constructor(private readonly logger: Logger) {}

  /** Register `listener`; call the returned function to unsubscribe. */
  subscribe(listener: FeedListener): () => void {
    this.listeners.add(listener)
    this.logger.debug('feed_subscribed', { subscribers: this.listeners.size })
    return () => {
      if (this.listeners.delete(listener)) {
        this.logger.debug('feed_unsubscribed', { subscribers: this.listeners.size })
      }
    }
  }

  publish(event: FeedEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event)
      } catch (err) {
        this.listeners.delete(listener)
        this.logger.warn('feed_subscriber_dropped', { type: event.type, ...serializeError(err) })
      }
    }
  }

  get size(): number {
    return this.listeners.size
  }
}
