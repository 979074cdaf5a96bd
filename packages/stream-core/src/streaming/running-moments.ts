// ---------------------------------------------------------------------------
// Streaming Estimators — Running Moments
// ---------------------------------------------------------------------------
// Single-pass mean, variance, skewness and kurtosis (Welford / Terriberry
// update of the central-moment sums M2, M3, M4). No history is kept.
// ---------------------------------------------------------------------------

import type { MomentsSummary, RunningMomentsState } from '../types.js';

export function createRunningMoments(): RunningMomentsState {
  return { n: 0, mean: 0, m2: 0, m3: 0, m4: 0 };
}

/** Fold one observation into the accumulator. */
export function momentsUpdate(state: RunningMomentsState, x: number): void {
  const n1 = state.n;
  const n = n1 + 1;
  const delta = x - state.mean;
  const deltaN = delta / n;
  const deltaN2 = deltaN * deltaN;
  const term1 = delta * deltaN * n1;

  state.n = n;
  state.mean += deltaN;
  state.m4 += term1 * deltaN2 * (n * n - 3 * n + 3) + 6 * deltaN2 * state.m2 - 4 * deltaN * state.m3;
  state.m3 += term1 * deltaN * (n - 2) - 3 * deltaN * state.m2;
  state.m2 += term1;
}

/**
 * Combine two partial accumulators as if every observation had gone through
 * one of them (pairwise update, Pébay 2008). Inputs are left untouched.
 */
export function momentsMerge(a: RunningMomentsState, b: RunningMomentsState): RunningMomentsState {
  if (a.n === 0) return { ...b };
  if (b.n === 0) return { ...a };

  const na = a.n;
  const nb = b.n;
  const n = na + nb;
  const delta = b.mean - a.mean;
  const delta2 = delta * delta;
  const delta3 = delta2 * delta;
  const delta4 = delta2 * delta2;

  const m2 = a.m2 + b.m2 + (delta2 * na * nb) / n;
  const m3 =
    a.m3 +
    b.m3 +
    (delta3 * na * nb * (na - nb)) / (n * n) +
    (3 * delta * (na * b.m2 - nb * a.m2)) / n;
  const m4 =
    a.m4 +
    b.m4 +
    (delta4 * na * nb * (na * na - na * nb + nb * nb)) / (n * n * n) +
    (6 * delta2 * (na * na * b.m2 + nb * nb * a.m2)) / (n * n) +
    (4 * delta * (na * b.m3 - nb * a.m3)) / n;

  return { n, mean: a.mean + (delta * nb) / n, m2, m3, m4 };
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------
// Each returns 0 below its minimum sample size (1, 2, 3, 4). Check `n` to tell
// "insufficient data" from a true zero.
// ---------------------------------------------------------------------------

export function momentsMean(state: RunningMomentsState): number {
  return state.n > 0 ? state.mean : 0;
}

/** Sample variance M2 / (n - 1). */
export function momentsVariance(state: RunningMomentsState): number {
  return state.n > 1 ? state.m2 / (state.n - 1) : 0;
}

/** sqrt(n) * M3 / M2^1.5; 0 for a constant stream. */
export function momentsSkewness(state: RunningMomentsState): number {
  if (state.n < 3 || state.m2 <= 0) return 0;
  return (Math.sqrt(state.n) * state.m3) / Math.pow(state.m2, 1.5);
}

/** Excess kurtosis n * M4 / M2^2 - 3; 0 for a constant stream. */
export function momentsKurtosis(state: RunningMomentsState): number {
  if (state.n < 4 || state.m2 <= 0) return 0;
  return (state.n * state.m4) / (state.m2 * state.m2) - 3;
}

export function momentsSummary(state: RunningMomentsState): MomentsSummary {
  return {
    count: state.n,
    mean: momentsMean(state),
    variance: momentsVariance(state),
    skewness: momentsSkewness(state),
    kurtosis: momentsKurtosis(state),
  };
}
