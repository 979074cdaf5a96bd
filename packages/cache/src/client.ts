import { Redis } from 'ioredis'

export const DEFAULT_REDIS_URL = 'redis://localhost:6379'

/**
 * Create a Redis client. The connection opens on first command, so building
 * the server does not require Redis to be up.
 */
export function createRedisClient(url: string = DEFAULT_REDIS_URL): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  })
}

/** Check if Redis is connected and responding. */
export async function redisHealthCheck(redis: Redis): Promise<boolean> {
  try {
    const pong = await redis.ping()
    return pong === 'PONG'
  } catch {
    return false
  }
}
