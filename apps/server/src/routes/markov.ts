import { Hono } from 'hono'
import { markovPredictQuerySchema, strategyRequestSchema } from '@athlete-pulse/shared'
import { UnknownStateError } from '@athlete-pulse/markov-core'
import type { EventProcessor } from '../pipeline/processor.js'
import { parseBody, parseQuery, isResponse } from '../lib/validate.js'

export function markovRoutes(processor: EventProcessor) {
  const routes = new Hono()

  /** GET /api/markov/predict/:state?steps=1 — state distribution after n steps */
  routes.get('/predict/:state', (c) => {
    const query = parseQuery(c, markovPredictQuerySchema)
    if (isResponse(query)) return query

    const state = c.req.param('state')
    try {
      const distribution = processor.predictState(state, query.steps)
      return c.json({ state, steps: query.steps, distribution })
    } catch (err) {
      if (err instanceof UnknownStateError) {
        return c.json({ error: `Unknown state "${err.state}".`, states: processor.states }, 404)
      }
      throw err
    }
  })

  /** POST /api/markov/strategy — rank interventions by long-run reward */
  routes.post('/strategy', async (c) => {
    const data = await parseBody(c, strategyRequestSchema)
    if (isResponse(data)) return data
    return c.json({ ranking: processor.rankStrategies(data.rewards) })
  })

  return routes
}
