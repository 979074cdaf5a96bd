import type { Redis } from 'ioredis'

/** List that producers LPUSH raw athlete records onto. */
export const TIMELINE_KEY = 'events:timeline'

export interface EventTimeline {
  /** Append a record (JSON-encoded) at the head. */
  push(record: unknown): Promise<number>
  /**
   * Take the oldest raw entry, waiting up to `timeoutSeconds` (0 waits
   * forever). Null on timeout.
   */
  pop(timeoutSeconds: number): Promise<string | null>
  length(): Promise<number>
}

/**
 * FIFO over a Redis list: LPUSH at the head, BRPOP from the tail.
 *
 * BRPOP blocks its connection, so give the timeline a client of its own
 * (`redis.duplicate()`) rather than the one serving cache reads.
 */
export function createTimeline(redis: Redis, key: string = TIMELINE_KEY): EventTimeline {
  return {
    async push(record: unknown): Promise<number> {
      return redis.lpush(key, JSON.stringify(record))
    },

    async pop(timeoutSeconds: number): Promise<string | null> {
      const item = await redis.brpop(key, timeoutSeconds)
      return item === null ? null : item[1]
    },

    async length(): Promise<number> {
      return redis.llen(key)
    },
  }
}
