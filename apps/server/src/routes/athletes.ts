import { randomUUID } from 'node:crypto'
import { Hono } from 'hono'
import { athleteRecordSchema, toPerformanceEvent } from '@athlete-pulse/shared'
import type { EventProcessor } from '../pipeline/processor.js'
import { parseBody, isResponse } from '../lib/validate.js'

export interface AthleteRoutesOptions {
  processor: EventProcessor
  /** Fallback timestamp for records without one (ms). */
  now?: () => number
  newId?: () => string
}

export function athleteRoutes({ processor, now = Date.now, newId = randomUUID }: AthleteRoutesOptions) {
  const routes = new Hono()

  /** POST /api/athletes — ingest one athlete record */
  routes.post('/', async (c) => {
    const record = await parseBody(c, athleteRecordSchema)
    if (isResponse(record)) return record

    const result = processor.process(toPerformanceEvent(record, newId(), now()))
    return c.json({ status: 'accepted', athleteId: result.athleteId, result }, 202)
  })

  /** GET /api/athletes/:athleteId/moments — running moments for one athlete */
  routes.get('/:athleteId/moments', (c) => {
    const athleteId = c.req.param('athleteId')
    const moments = processor.athleteMoments(athleteId)
    if (moments === null) return c.json({ error: 'Athlete not found.' }, 404)
    return c.json({ athleteId, moments })
  })

  return routes
}
