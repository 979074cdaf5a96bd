// ---------------------------------------------------------------------------
// Performance-State Transitions — Core Types
// ---------------------------------------------------------------------------

export { ConfigError } from '@athlete-pulse/stream-core';

/** Raised when a query names a state outside the model's label set. */
export class UnknownStateError extends Error {
  readonly state: string;

  constructor(state: string) {
    super(`Unknown state: ${state}`);
    this.name = 'UnknownStateError';
    this.state = state;
  }
}

/** Row-stochastic matrix: entry [i][j] is P(next = j | current = i). */
export type Matrix = readonly (readonly number[])[];

/** Probability per state label. */
export type StateDistribution = Record<string, number>;

export interface TransitionModelOptions {
  readonly states: readonly string[];
  /** Added to every count before normalizing; must be > 0. Default 1e-3. */
  readonly smoothing?: number;
}

export interface PowerIterationOptions {
  /** L1 distance between successive iterates that counts as converged. */
  readonly tol?: number;
  readonly maxIter?: number;
}

export interface PowerIterationResult {
  readonly vector: number[];
  readonly iterations: number;
  readonly converged: boolean;
}

export interface StationaryResult {
  readonly distribution: StateDistribution;
  readonly iterations: number;
  /** False when the iteration cap was hit; `distribution` is the last iterate. */
  readonly converged: boolean;
}

export interface MixingTimeOptions {
  /** Total variation distance to the stationary distribution. */
  readonly tol?: number;
  readonly maxSteps?: number;
}

export interface MarkovAnalysis {
  readonly states: readonly string[];
  readonly transitions: Record<string, StateDistribution>;
  readonly stationary: StationaryResult;
  readonly aperiodic: boolean;
  readonly irreducible: boolean;
  readonly mixingTime: number;
  readonly totalObservations: number;
}

// ---------------------------------------------------------------------------
// Strategy evaluation
// ---------------------------------------------------------------------------

export const ACTIONS = ['none', 'rest'] as const;
export type Action = (typeof ACTIONS)[number];

export interface ActionEvaluation {
  readonly action: Action;
  /** Long-run reward per step under the adjusted chain. */
  readonly expectedReward: number;
  readonly distribution: StateDistribution;
}
