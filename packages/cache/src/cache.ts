import type { Redis } from 'ioredis'

export interface JsonCache {
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>
}

/** JSON values in Redis. */
export function createCache(redis: Redis): JsonCache {
  return {
    /** Set a JSON value with optional TTL in seconds. */
    async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
      const json = JSON.stringify(value)
      if (ttlSeconds !== undefined) {
        await redis.set(key, json, 'EX', ttlSeconds)
      } else {
        await redis.set(key, json)
      }
    },
  }
}
