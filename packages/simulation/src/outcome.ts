/**
 * Monte Carlo outcome simulator.
 *
 * A deterministic base probability from weighted, normalized attributes is
 * perturbed per run by Gaussian noise, clamped to [0, 1] and used for one
 * Bernoulli draw. The estimate is the success fraction over all runs.
 */

import type { OutcomeInputs, OutcomeOptions, OutcomeResult } from './types.js'
import { Rng } from './random.js'

const SPEED_SCALE = 30
const WEIGHTS = { speed: 0.4, accuracy: 0.4, stamina: 0.2 } as const

/** 0.4 * speed / 30 + 0.4 * accuracy / 100 + 0.2 * stamina / 100 */
export function baseProbability({ speed, accuracy, stamina }: OutcomeInputs): number {
  return (
    (speed / SPEED_SCALE) * WEIGHTS.speed +
    (accuracy / 100) * WEIGHTS.accuracy +
    (stamina / 100) * WEIGHTS.stamina
  )
}

/**
 * @throws RangeError if `trials` is not a positive integer or `noiseStd` is
 *         negative or not finite.
 */
export function simulateSuccessProbability(
  inputs: OutcomeInputs,
  options: OutcomeOptions = {},
): OutcomeResult {
  const { trials = 1000, noiseStd = 0.1 } = options
  if (!Number.isInteger(trials) || trials < 1) {
    throw new RangeError(`trials must be a positive integer, got ${trials}`)
  }
  if (!Number.isFinite(noiseStd) || noiseStd < 0) {
    throw new RangeError(`noiseStd must be a non-negative number, got ${noiseStd}`)
  }

  const rng = options.rng ?? new Rng()
  const base = baseProbability(inputs)

  let successes = 0
  for (let i = 0; i < trials; i++) {
    const p = Math.min(Math.max(base + rng.normal(0, noiseStd), 0), 1)
    if (rng.next() < p) successes++
  }

  return { probability: successes / trials, baseProbability: base, successes, trials }
}
