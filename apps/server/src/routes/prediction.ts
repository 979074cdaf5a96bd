import { Hono } from 'hono'
import { predictionRequestSchema } from '@athlete-pulse/shared'
import { Rng, simulateSuccessProbability } from '@athlete-pulse/simulation'
import { parseBody, isResponse } from '../lib/validate.js'

export const predictionRoutes = new Hono()

/** POST /api/prediction/monte-carlo — success probability for given attributes */
predictionRoutes.post('/monte-carlo', async (c) => {
  const data = await parseBody(c, predictionRequestSchema)
  if (isResponse(data)) return data

  const { speed, accuracy, stamina, simulationCount, seed } = data
  const result = simulateSuccessProbability(
    { speed, accuracy, stamina },
    { trials: simulationCount, rng: seed === undefined ? undefined : new Rng(seed) },
  )
  return c.json(result)
})
