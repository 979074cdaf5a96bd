import { Hono } from 'hono'
import { similarityQuerySchema } from '@athlete-pulse/shared'
import type { EventProcessor } from '../pipeline/processor.js'
import { parseQuery, isResponse } from '../lib/validate.js'

export function similarityRoutes(processor: EventProcessor) {
  const routes = new Hono()

  /** GET /api/similarity/:athleteId?k=5 — nearest athletes by mean attributes */
  routes.get('/:athleteId', (c) => {
    const query = parseQuery(c, similarityQuerySchema)
    if (isResponse(query)) return query

    const athleteId = c.req.param('athleteId')
    const k = query.k ?? processor.neighborCount
    const similar = processor.similarTo(athleteId, k)
    if (similar === null) return c.json({ error: 'Athlete not found.' }, 404)
    return c.json({ athleteId, k, similar })
  })

  return routes
}
