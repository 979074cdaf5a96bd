export { createRedisClient, redisHealthCheck, DEFAULT_REDIS_URL } from './client.js'
export { createCache } from './cache.js'
export type { JsonCache } from './cache.js'
export { createTimeline, TIMELINE_KEY } from './timeline.js'
export type { EventTimeline } from './timeline.js'
