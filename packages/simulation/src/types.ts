import type { Rng } from './random.js'

/** Athlete attributes on their natural scales. */
export interface OutcomeInputs {
  /** m/s; 30 m/s counts as full marks. */
  speed: number
  /** Percent, 0-100. */
  accuracy: number
  /** Percent, 0-100. */
  stamina: number
}

export interface OutcomeOptions {
  /** Independent runs (positive integer). Default 1000. */
  trials?: number
  /** Standard deviation of the per-run Gaussian match noise. Default 0.1. */
  noiseStd?: number
  /** Pass a seeded generator for reproducible results. */
  rng?: Rng
}

export interface OutcomeResult {
  /** Fraction of successful runs. */
  probability: number
  /** Weighted score before noise (not clamped). */
  baseProbability: number
  successes: number
  trials: number
}
