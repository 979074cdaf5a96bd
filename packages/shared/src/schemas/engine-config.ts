import { z } from 'zod'
import { PERFORMANCE_STATES } from '@athlete-pulse/types'

/** Construction-time parameters of every sketch and model the engine owns. */
export const engineConfigSchema = z.object({
  bloomCapacity: z.number().int().positive(),
  bloomErrorRate: z.number().gt(0).lt(1),
  cmsWidth: z.number().int().positive(),
  cmsDepth: z.number().int().positive(),
  heavyHitterCapacity: z.number().int().positive(),
  hllPrecision: z.number().int().min(4).max(18),
  samplerSize: z.number().int().positive(),
  windowSeconds: z.number().positive(),
  amsK: z.number().int().positive(),
  markovStates: z
    .array(z.string().min(1))
    .min(1, 'At least one state is required')
    .refine((states) => new Set(states).size === states.length, 'State labels must be unique'),
  markovSmoothing: z.number().positive(),
  simulationTrials: z.number().int().positive(),
  knnNeighbors: z.number().int().positive(),
  seed: z.number().int().nonnegative(),
})

export type EngineConfig = z.infer<typeof engineConfigSchema>

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  bloomCapacity: 10_000,
  bloomErrorRate: 0.001,
  cmsWidth: 2000,
  cmsDepth: 5,
  heavyHitterCapacity: 100,
  hllPrecision: 14,
  samplerSize: 200,
  windowSeconds: 300,
  amsK: 10,
  markovStates: [...PERFORMANCE_STATES],
  markovSmoothing: 1e-3,
  simulationTrials: 1000,
  knnNeighbors: 5,
  seed: 42,
}
