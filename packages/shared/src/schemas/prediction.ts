import { z } from 'zod'

export const predictionRequestSchema = z.object({
  speed: z.number().min(0).max(100),
  accuracy: z.number().min(0).max(100),
  stamina: z.number().min(0).max(100),
  simulationCount: z.number().int().min(1).max(100_000).default(1000),
  seed: z.number().int().nonnegative().optional(),
})

/** `k` falls back to the engine's configured neighbour count when absent. */
export const similarityQuerySchema = z.object({
  k: z.coerce.number().int().min(1).max(50).optional(),
})

export const markovPredictQuerySchema = z.object({
  steps: z.coerce.number().int().min(0).max(1000).default(1),
})

/** Reward earned per step spent in each state; unlisted states earn 0. */
export const strategyRequestSchema = z.object({
  rewards: z.record(z.string().min(1), z.number().finite()),
})

export type PredictionRequest = z.infer<typeof predictionRequestSchema>
export type SimilarityQuery = z.infer<typeof similarityQuerySchema>
export type MarkovPredictQuery = z.infer<typeof markovPredictQuerySchema>
export type StrategyRequest = z.infer<typeof strategyRequestSchema>
