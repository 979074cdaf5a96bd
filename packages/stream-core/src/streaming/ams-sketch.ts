// ---------------------------------------------------------------------------
// Streaming Estimators — AMS Sketch (second frequency moment)
// ---------------------------------------------------------------------------
// Randomized linear projection: each of k accumulators adds +weight or
// -weight depending on a per-seed pseudo-random sign of the value. The mean
// of the squared accumulators is an unbiased estimate of F2, the sum over
// distinct values of (net weight)^2.
// ---------------------------------------------------------------------------

import type { AmsSketchConfig, AmsSketchState } from '../types.js';
import { deriveSeeds, murmurHash3Bytes, requireInteger } from '../types.js';

const encoder = new TextEncoder();

/**
 * Create an AMS sketch with `k` accumulators. Larger k narrows the spread of
 * the estimate (its variance falls as 1/k).
 *
 * @throws ConfigError unless k is an integer >= 1.
 */
export function createAmsSketch(config: AmsSketchConfig): AmsSketchState {
  requireInteger('k', config.k, 1);
  return {
    seeds: deriveSeeds(config.seed ?? 0, config.k),
    accumulators: new Float64Array(config.k),
  };
}

/**
 * Add `weight` (default 1) for a discretized value such as a speed bin.
 * Numbers and strings share one key space: `7` and `"7"` are the same value.
 */
export function amsUpdate(state: AmsSketchState, value: string | number, weight = 1): void {
  const data = encoder.encode(String(value));
  const acc = state.accumulators;
  for (let i = 0; i < acc.length; i++) {
    const sign = (murmurHash3Bytes(data, state.seeds[i]!) & 1) === 0 ? 1 : -1;
    acc[i] = acc[i]! + sign * weight;
  }
}

/** Mean of the squared accumulators. */
export function amsEstimate(state: AmsSketchState): number {
  const acc = state.accumulators;
  let sum = 0;
  for (let i = 0; i < acc.length; i++) sum += acc[i]! * acc[i]!;
  return sum / acc.length;
}
