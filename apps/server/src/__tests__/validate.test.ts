import { describe, it, expect } from 'vitest'
import { Hono } from 'hono'
import { athleteRecordSchema, similarityQuerySchema } from '@athlete-pulse/shared'
import { parseBody, parseQuery, isResponse } from '../lib/validate.js'

function recordApp() {
  const app = new Hono()
  app.post('/records', async (c) => {
    const record = await parseBody(c, athleteRecordSchema)
    if (isResponse(record)) return record
    return c.json({ record })
  })
  return app
}

function sendRecord(body: string) {
  return recordApp().request('/records', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  })
}

const reading = {
  player: 'Ada',
  sport: 'basketball',
  performanceData: { speed: '12.5 m/s', accuracy: '78%', stamina: 64 },
}

describe('parseBody', () => {
  it('returns the parsed record with units stripped and defaults applied', async () => {
    const res = await sendRecord(JSON.stringify(reading))

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      record: {
        player: 'Ada',
        sport: 'basketball',
        playType: 'offensive',
        performancePeak: false,
        performanceData: { speed: 12.5, accuracy: 78, stamina: 64 },
      },
    })
  })

  it('returns 400 for a body that is not JSON', async () => {
    const res = await sendRecord('{"player":')
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'Invalid JSON body.' })
  })

  it('reports each failing field', async () => {
    const res = await sendRecord(JSON.stringify({ ...reading, player: '', sport: 'chess' }))

    expect(res.status).toBe(400)
    const body = await res.json()
    expect(body).toMatchObject({
      error: 'Validation failed.',
      fields: { player: ['Player is required'], sport: expect.any(Array) },
    })
    expect(body).not.toHaveProperty('fields.performanceData')
  })

  it('rejects a reading with an unknown unit', async () => {
    const res = await sendRecord(
      JSON.stringify({ ...reading, performanceData: { ...reading.performanceData, speed: '45 km/h' } }),
    )

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ fields: { performanceData: expect.any(Array) } })
  })
})

describe('parseQuery', () => {
  function similarityApp() {
    const app = new Hono()
    app.get('/similar', (c) => {
      const query = parseQuery(c, similarityQuerySchema)
      if (isResponse(query)) return query
      return c.json({ query })
    })
    return app
  }

  it('coerces k from the query string', async () => {
    const res = await similarityApp().request('/similar?k=3')
    expect(await res.json()).toEqual({ query: { k: 3 } })
  })

  it('leaves k out when the parameter is absent', async () => {
    const res = await similarityApp().request('/similar')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ query: {} })
  })

  it('returns 400 with field errors for k outside 1..50', async () => {
    for (const k of ['0', '51', 'lots']) {
      const res = await similarityApp().request(`/similar?k=${k}`)
      expect(res.status).toBe(400)
      expect(await res.json()).toMatchObject({ error: 'Validation failed.', fields: { k: expect.any(Array) } })
    }
  })
})

describe('isResponse', () => {
  it('tells a validation response from parsed data', () => {
    expect(isResponse(new Response())).toBe(true)
    expect(isResponse({ k: 3 })).toBe(false)
    expect(isResponse(null)).toBe(false)
  })
})
