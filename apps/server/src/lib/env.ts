/**
 * Environment configuration: fail-fast on startup.
 *
 * Call `loadEnv()` once in the server entry point. Invalid values throw with
 * the offending variable named.
 */

import { z } from 'zod'
import { DEFAULT_ENGINE_CONFIG, engineConfigSchema, type EngineConfig } from '@athlete-pulse/shared'
import { LOG_LEVELS, type LogLevel } from './logger.js'

type Source = Record<string, string | undefined>

function optional(source: Source, key: string, fallback: string): string {
  const val = source[key]
  return val === undefined || val === '' ? fallback : val
}

function optionalNumber(source: Source, key: string, fallback: number): number {
  const raw = optional(source, key, String(fallback))
  const val = Number(raw)
  if (!Number.isFinite(val)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}".`)
  }
  return val
}

function optionalList(source: Source, key: string, fallback: readonly string[]): string[] {
  return optional(source, key, fallback.join(','))
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
}

const serverSchema = z.object({
  PORT: z.number().int().min(1).max(65535),
  NODE_ENV: z.string(),
  LOG_LEVEL: z.enum(LOG_LEVELS),
  REDIS_URL: z.string().url(),
  REDIS_ENABLED: z.boolean(),
  CORS_ORIGINS: z.array(z.string()),
  ANALYTICS_UPDATE_INTERVAL: z.number().positive(),
  ANALYTICS_TTL: z.number().int().positive(),
  TIMELINE_POLL_TIMEOUT: z.number().int().nonnegative(),
  HEARTBEAT_INTERVAL: z.number().positive(),
})

export interface Env {
  PORT: number
  NODE_ENV: string
  LOG_LEVEL: LogLevel
  REDIS_URL: string
  /** When false the server runs without the poller and snapshot cache. */
  REDIS_ENABLED: boolean
  CORS_ORIGINS: string[]
  /** Seconds between analytics snapshots. */
  ANALYTICS_UPDATE_INTERVAL: number
  /** Seconds the cached analytics snapshot lives. */
  ANALYTICS_TTL: number
  /** Seconds each BRPOP waits before the poller loops. */
  TIMELINE_POLL_TIMEOUT: number
  /** Seconds between feed heartbeats. */
  HEARTBEAT_INTERVAL: number
  engine: EngineConfig
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
}

export function loadEnv(source: Source = process.env): Env {
  const interval = optionalNumber(source, 'ANALYTICS_UPDATE_INTERVAL', 60)

  const server = serverSchema.safeParse({
    PORT: optionalNumber(source, 'PORT', 8000),
    NODE_ENV: optional(source, 'NODE_ENV', 'development'),
    LOG_LEVEL: optional(source, 'LOG_LEVEL', 'info'),
    REDIS_URL: optional(source, 'REDIS_URL', 'redis://localhost:6379'),
    REDIS_ENABLED: optional(source, 'REDIS_ENABLED', 'true').toLowerCase() !== 'false',
    CORS_ORIGINS: optionalList(source, 'CORS_ORIGINS', ['http://localhost:3000']),
    ANALYTICS_UPDATE_INTERVAL: interval,
    ANALYTICS_TTL: optionalNumber(source, 'ANALYTICS_TTL', Math.ceil(interval * 2)),
    TIMELINE_POLL_TIMEOUT: optionalNumber(source, 'TIMELINE_POLL_TIMEOUT', 5),
    HEARTBEAT_INTERVAL: optionalNumber(source, 'HEARTBEAT_INTERVAL', 15),
  })
  if (!server.success) {
    throw new Error(`Invalid server configuration: ${describeIssues(server.error)}`)
  }

  const d = DEFAULT_ENGINE_CONFIG
  const engine = engineConfigSchema.safeParse({
    bloomCapacity: optionalNumber(source, 'BLOOM_FILTER_CAPACITY', d.bloomCapacity),
    bloomErrorRate: optionalNumber(source, 'BLOOM_FILTER_ERROR_RATE', d.bloomErrorRate),
    cmsWidth: optionalNumber(source, 'CMS_WIDTH', d.cmsWidth),
    cmsDepth: optionalNumber(source, 'CMS_DEPTH', d.cmsDepth),
    heavyHitterCapacity: optionalNumber(source, 'HEAVY_HITTER_CAPACITY', d.heavyHitterCapacity),
    hllPrecision: optionalNumber(source, 'HLL_PRECISION', d.hllPrecision),
    samplerSize: optionalNumber(source, 'MINWISE_SAMPLE_SIZE', d.samplerSize),
    windowSeconds: optionalNumber(source, 'DGIM_WINDOW_SIZE', d.windowSeconds),
    amsK: optionalNumber(source, 'AMS_K_VALUE', d.amsK),
    markovStates: optionalList(source, 'MARKOV_STATES', d.markovStates),
    markovSmoothing: optionalNumber(source, 'MARKOV_SMOOTHING', d.markovSmoothing),
    simulationTrials: optionalNumber(source, 'SIMULATION_TRIALS', d.simulationTrials),
    knnNeighbors: optionalNumber(source, 'KNN_NEIGHBORS', d.knnNeighbors),
    seed: optionalNumber(source, 'ENGINE_SEED', d.seed),
  })
  if (!engine.success) {
    throw new Error(`Invalid engine configuration: ${describeIssues(engine.error)}`)
  }

  return { ...server.data, engine: engine.data }
}
