import { describe, it, expect } from 'vitest'
import { createApp, type AppDeps } from '../app.js'
import type { CheckStatus } from '../routes/health.js'
import { createHarness, T0, type Harness } from './helpers.js'

/**
 * Route tests against an app wired to an in-process processor and feed.
 */

function buildApp(overrides: Partial<AppDeps> = {}): { app: ReturnType<typeof createApp>; harness: Harness } {
  const harness = createHarness()
  const app = createApp({
    processor: harness.processor,
    feed: harness.feed,
    logger: harness.logger,
    checks: async () => ({ redis: 'ok' }),
    corsOrigins: ['http://localhost:3000'],
    production: false,
    heartbeatMs: 60_000,
    now: () => harness.clock.now,
    ...overrides,
  })
  return { app, harness }
}

function post(body: unknown, ip = 'client-1'): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', 'x-forwarded-for': ip },
    body: JSON.stringify(body),
  }
}

const record = {
  _id: 'ath-1',
  player: 'Ada',
  sport: 'football',
  playType: 'offensive',
  performancePeak: true,
  performanceData: { speed: '12.5 m/s', accuracy: '78%', stamina: 64 },
  performanceState: 'good',
  previousPerformanceState: 'peak',
}

describe('API routes', () => {
  describe('Public endpoints', () => {
    it('GET / returns API info', async () => {
      const { app } = buildApp()
      const res = await app.request('/')
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ name: 'athlete-pulse', version: '0.1.0' })
    })

    it('GET /health reports checks and counters', async () => {
      const { app, harness } = buildApp()
      harness.feed.subscribe(() => {})
      const res = await app.request('/health')
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        status: 'healthy',
        checks: { redis: 'ok' },
        processed: 0,
        subscribers: 1,
      })
    })

    it('GET /health treats a disabled dependency as healthy', async () => {
      const { app } = buildApp({ checks: async () => ({ redis: 'disabled' }) })
      const res = await app.request('/health')
      expect(res.status).toBe(200)
    })

    it('GET /health returns 503 when a check fails', async () => {
      const failing: Record<string, CheckStatus> = { redis: 'error' }
      const { app } = buildApp({ checks: async () => failing })
      const res = await app.request('/health')
      expect(res.status).toBe(503)
      expect(await res.json()).toMatchObject({ status: 'degraded' })
    })

    it('returns JSON 404 for unknown routes', async () => {
      const { app } = buildApp()
      const res = await app.request('/nope')
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: 'Not found.' })
    })

    it('sets security headers', async () => {
      const { app } = buildApp()
      const res = await app.request('/')
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
      expect(res.headers.get('X-Frame-Options')).toBe('DENY')
      expect(res.headers.get('Strict-Transport-Security')).toBeNull()
    })

    it('sends HSTS in production', async () => {
      const { app } = buildApp({ production: true })
      const res = await app.request('/')
      expect(res.headers.get('Strict-Transport-Security')).toBe('max-age=31536000; includeSubDomains')
    })
  })

  describe('POST /api/athletes', () => {
    it('accepts a record with unit-suffixed readings', async () => {
      const { app, harness } = buildApp()
      const res = await app.request('/api/athletes', post(record))

      expect(res.status).toBe(202)
      expect(await res.json()).toMatchObject({
        status: 'accepted',
        athleteId: 'ath-1',
        result: { athleteId: 'ath-1', firstSeenPlay: true, frequency: 1 },
      })
      expect(harness.processor.processed).toBe(1)
      expect(harness.processor.athleteMoments('ath-1')?.speed.mean).toBe(12.5)
      expect(harness.processor.athleteMoments('ath-1')?.accuracy.mean).toBe(78)
    })

    it('assigns an id to records without one', async () => {
      const { app } = buildApp()
      const { _id: _omitted, ...anonymous } = record
      const res = await app.request('/api/athletes', post(anonymous))

      expect(res.status).toBe(202)
      expect(await res.json()).toMatchObject({ athleteId: expect.stringMatching(/^[0-9a-f-]{36}$/) })
    })

    it('returns 400 with field errors for an invalid record', async () => {
      const { app, harness } = buildApp()
      const res = await app.request(
        '/api/athletes',
        post({ ...record, sport: 'chess', performanceData: { speed: 'fast', accuracy: 1, stamina: 1 } }),
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({
        error: 'Validation failed.',
        fields: { sport: expect.any(Array), performanceData: expect.any(Array) },
      })
      expect(harness.processor.processed).toBe(0)
    })

    it('returns 400 for a body that is not JSON', async () => {
      const { app } = buildApp()
      const res = await app.request('/api/athletes', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: 'not json',
      })
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Invalid JSON body.' })
    })

    it('rate limits writes per client', async () => {
      const { app } = buildApp({ writeLimit: { windowMs: 60_000, max: 2 } })

      expect((await app.request('/api/athletes', post(record))).status).toBe(202)
      expect((await app.request('/api/athletes', post(record))).status).toBe(202)
      const limited = await app.request('/api/athletes', post(record))
      expect(limited.status).toBe(429)
      expect(limited.headers.get('Retry-After')).toBe('60')

      const other = await app.request('/api/athletes', post(record, 'client-2'))
      expect(other.status).toBe(202)
    })
  })

  describe('GET /api/athletes/:athleteId/moments', () => {
    it('returns moments for a known athlete', async () => {
      const { app } = buildApp()
      await app.request('/api/athletes', post(record))

      const res = await app.request('/api/athletes/ath-1/moments')
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({
        athleteId: 'ath-1',
        moments: { speed: { count: 1, mean: 12.5, variance: 0 }, stamina: { mean: 64 } },
      })
    })

    it('returns 404 for an unknown athlete', async () => {
      const { app } = buildApp()
      const res = await app.request('/api/athletes/nobody/moments')
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: 'Athlete not found.' })
    })
  })

  describe('analytics and streaming stats', () => {
    it('GET /api/streaming/stats reflects processed records', async () => {
      const { app } = buildApp()
      await app.request('/api/athletes', post(record))

      const res = await app.request('/api/streaming/stats')
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({
        processed: 1,
        playTypesSeen: 1,
        sampleSize: 1,
        windowPeaks: 1,
        trackedAthletes: 1,
      })
    })

    it('GET /api/analytics/summary includes heavy hitters and the chain', async () => {
      const { app } = buildApp()
      await app.request('/api/athletes', post(record))

      const res = await app.request('/api/analytics/summary')
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({
        generatedAt: new Date(T0).toISOString(),
        processed: 1,
        topAthletes: [{ key: 'ath-1', estimate: 1, player: 'Ada' }],
        markov: { totalObservations: 1, irreducible: false },
      })
    })
  })

  describe('POST /api/prediction/monte-carlo', () => {
    it('is reproducible with a seed', async () => {
      const { app } = buildApp()
      const body = { speed: 15, accuracy: 50, stamina: 50, simulationCount: 500, seed: 11 }

      const first = await (await app.request('/api/prediction/monte-carlo', post(body))).json()
      const second = await (await app.request('/api/prediction/monte-carlo', post(body))).json()

      expect(first).toEqual(second)
      expect(first).toMatchObject({ baseProbability: 0.5, trials: 500 })
    })

    it('rejects out-of-range attributes', async () => {
      const { app } = buildApp()
      const res = await app.request(
        '/api/prediction/monte-carlo',
        post({ speed: -1, accuracy: 50, stamina: 50 }),
      )
      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({ fields: { speed: expect.any(Array) } })
    })
  })

  describe('GET /api/similarity/:athleteId', () => {
    it('returns 404 for an unknown athlete', async () => {
      const { app } = buildApp()
      const res = await app.request('/api/similarity/nobody')
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: 'Athlete not found.' })
    })

    it('lists the nearest athletes', async () => {
      const { app } = buildApp()
      for (const [id, speed] of [
        ['a', 10],
        ['b', 11],
        ['c', 20],
      ] as const) {
        const body = { ...record, _id: id, performanceData: { speed, accuracy: 50, stamina: 50 } }
        await app.request('/api/athletes', post(body))
      }

      const res = await app.request('/api/similarity/a?k=1')
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({ athleteId: 'a', k: 1, similar: [{ id: 'b', rank: 1 }] })
    })

    it('defaults k to the configured neighbour count', async () => {
      const { app } = buildApp()
      for (const [id, speed] of [
        ['a', 10],
        ['b', 11],
        ['c', 20],
      ] as const) {
        const body = { ...record, _id: id, performanceData: { speed, accuracy: 50, stamina: 50 } }
        await app.request('/api/athletes', post(body))
      }

      const res = await app.request('/api/similarity/a')
      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({ athleteId: 'a', k: 5, similar: [{ id: 'b' }, { id: 'c' }] })
    })

    it('rejects a non-numeric k', async () => {
      const { app } = buildApp()
      const res = await app.request('/api/similarity/a?k=lots')
      expect(res.status).toBe(400)
    })
  })

  describe('GET /api/markov/predict/:state', () => {
    it('returns the distribution after n steps', async () => {
      const { app } = buildApp()
      const res = await app.request('/api/markov/predict/good?steps=0')
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        state: 'good',
        steps: 0,
        distribution: { peak: 0, good: 1, average: 0, declining: 0, injured: 0 },
      })
    })

    it('returns 404 with the known states for an unknown state', async () => {
      const { app } = buildApp()
      const res = await app.request('/api/markov/predict/resting')
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({
        error: 'Unknown state "resting".',
        states: ['peak', 'good', 'average', 'declining', 'injured'],
      })
    })
  })

  describe('POST /api/markov/strategy', () => {
    it('ranks rest above none when only good is rewarded', async () => {
      const { app } = buildApp()
      // Untrained chain: uniform rows; rest moves 0.05 from injured to good.
      const res = await app.request('/api/markov/strategy', post({ rewards: { good: 1 } }))

      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({
        ranking: [
          { action: 'rest', expectedReward: expect.closeTo(0.25, 9) },
          { action: 'none', expectedReward: expect.closeTo(0.2, 9) },
        ],
      })
    })

    it('is rate limited like the other writes', async () => {
      const { app } = buildApp({ writeLimit: { windowMs: 60_000, max: 1 } })
      const body = { rewards: { good: 1 } }

      expect((await app.request('/api/markov/strategy', post(body))).status).toBe(200)
      const limited = await app.request('/api/markov/strategy', post(body))
      expect(limited.status).toBe(429)
      expect(await limited.json()).toEqual({ error: 'Too many requests. Please try again later.' })
    })

    it('rejects non-numeric rewards', async () => {
      const { app } = buildApp()
      const res = await app.request('/api/markov/strategy', post({ rewards: { good: 'high' } }))
      expect(res.status).toBe(400)
    })
  })
})
