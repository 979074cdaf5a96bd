import { describe, it, expect } from 'vitest'
import { DEFAULT_ENGINE_CONFIG } from '@athlete-pulse/shared'
import { loadEnv } from '../lib/env.js'

describe('loadEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    const env = loadEnv({})

    expect(env).toEqual({
      PORT: 8000,
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      REDIS_URL: 'redis://localhost:6379',
      REDIS_ENABLED: true,
      CORS_ORIGINS: ['http://localhost:3000'],
      ANALYTICS_UPDATE_INTERVAL: 60,
      ANALYTICS_TTL: 120,
      TIMELINE_POLL_TIMEOUT: 5,
      HEARTBEAT_INTERVAL: 15,
      engine: DEFAULT_ENGINE_CONFIG,
    })
  })

  it('reads server and engine settings', () => {
    const env = loadEnv({
      PORT: '9100',
      LOG_LEVEL: 'debug',
      REDIS_ENABLED: 'FALSE',
      CORS_ORIGINS: 'https://a.test, https://b.test',
      ANALYTICS_UPDATE_INTERVAL: '30',
      CMS_WIDTH: '500',
      DGIM_WINDOW_SIZE: '90',
      MARKOV_STATES: 'hot,warm,cold',
      ENGINE_SEED: '3',
    })

    expect(env.PORT).toBe(9100)
    expect(env.LOG_LEVEL).toBe('debug')
    expect(env.REDIS_ENABLED).toBe(false)
    expect(env.CORS_ORIGINS).toEqual(['https://a.test', 'https://b.test'])
    expect(env.ANALYTICS_TTL).toBe(60)
    expect(env.engine).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      cmsWidth: 500,
      windowSeconds: 90,
      markovStates: ['hot', 'warm', 'cold'],
      seed: 3,
    })
  })

  it('treats empty strings as unset', () => {
    expect(loadEnv({ PORT: '', CMS_DEPTH: '' }).engine.cmsDepth).toBe(5)
  })

  it('rejects a non-numeric value', () => {
    expect(() => loadEnv({ AMS_K_VALUE: 'ten' })).toThrow(
      'Environment variable AMS_K_VALUE must be a number, got "ten".',
    )
  })

  it('rejects out-of-range engine parameters', () => {
    expect(() => loadEnv({ BLOOM_FILTER_ERROR_RATE: '1.5' })).toThrow(
      /^Invalid engine configuration: bloomErrorRate: /,
    )
    expect(() => loadEnv({ HLL_PRECISION: '20' })).toThrow(/hllPrecision/)
    expect(() => loadEnv({ MARKOV_STATES: 'a,b,a' })).toThrow(/State labels must be unique/)
  })

  it('rejects an unknown log level', () => {
    expect(() => loadEnv({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid server configuration: LOG_LEVEL: /)
  })
})
