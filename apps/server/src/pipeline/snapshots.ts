import type { JsonCache } from '@athlete-pulse/cache'
import type { EventProcessor } from './processor.js'
import type { FeedHub } from './feed.js'

export const SUMMARY_CACHE_KEY = 'analytics:summary'

export interface SnapshotOptions {
  processor: EventProcessor
  feed: FeedHub
  /** Absent when Redis is disabled; the feed still gets the snapshot. */
  cache?: JsonCache
  ttlSeconds: number
}

/** Cache the analytics summary and announce a snapshot on the feed. */
export async function publishSnapshot({ processor, feed, cache, ttlSeconds }: SnapshotOptions): Promise<void> {
  if (cache !== undefined) {
    await cache.set(SUMMARY_CACHE_KEY, processor.analyticsSummary(), ttlSeconds)
  }
  feed.publish(processor.snapshotEvent())
}
