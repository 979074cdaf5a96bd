// ---------------------------------------------------------------------------
// Streaming Estimators — Count-Min Sketch + Heavy Hitters
// ---------------------------------------------------------------------------
// Probabilistic frequency estimator. Overestimates are possible, but the
// minimum over all rows never falls below the true count.
// ---------------------------------------------------------------------------

import type {
  CountMinSketchConfig,
  CountMinSketchState,
  HeavyHitter,
  HeavyHittersConfig,
  HeavyHittersState,
} from '../types.js';
import { deriveSeeds, murmurHash3Bytes, requireInteger } from '../types.js';

const encoder = new TextEncoder();

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * Create a Count-Min Sketch with the given width and depth.
 *
 * - `width` controls accuracy: additive error is at most total / width.
 * - `depth` controls confidence: the bound fails with probability (1/2)^depth.
 *
 * The table is stored as a flat Float64Array of width * depth so weighted
 * (non-integer) counts are kept exactly.
 *
 * @throws ConfigError unless width and depth are integers >= 1.
 */
export function createCountMinSketch(config: CountMinSketchConfig): CountMinSketchState {
  requireInteger('width', config.width, 1);
  requireInteger('depth', config.depth, 1);

  return {
    table: new Float64Array(config.width * config.depth),
    width: config.width,
    depth: config.depth,
    seeds: deriveSeeds(config.seed ?? 0, config.depth),
    total: 0,
  };
}

// ---------------------------------------------------------------------------
// Add / Estimate
// ---------------------------------------------------------------------------

/**
 * Add `count` occurrences of `key` (default 1). Mutates state in-place.
 *
 * @throws RangeError for a negative or non-finite count; negative updates
 *         would break the never-underestimate guarantee.
 */
export function cmsAdd(state: CountMinSketchState, key: string, count = 1): void {
  if (!Number.isFinite(count) || count < 0) {
    throw new RangeError(`Count-Min Sketch counts must be finite and >= 0, got ${count}`);
  }

  const data = encoder.encode(key);
  for (let row = 0; row < state.depth; row++) {
    const col = murmurHash3Bytes(data, state.seeds[row]!) % state.width;
    const idx = row * state.width + col;
    state.table[idx] = state.table[idx]! + count;
  }

  state.total += count;
}

/**
 * Estimated frequency of `key`: the minimum counter across all rows.
 * Always >= the true count.
 */
export function cmsEstimate(state: CountMinSketchState, key: string): number {
  const data = encoder.encode(key);
  let minCount = Infinity;

  for (let row = 0; row < state.depth; row++) {
    const col = murmurHash3Bytes(data, state.seeds[row]!) % state.width;
    const val = state.table[row * state.width + col]!;
    if (val < minCount) minCount = val;
  }

  return minCount;
}

/**
 * Additive error bound on any single estimate: total / width.
 */
export function cmsErrorBound(state: CountMinSketchState): number {
  return state.total / state.width;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Element-wise sum of two sketches with identical dimensions and seeds.
 *
 * @throws If the sketches were built differently.
 */
export function cmsMerge(
  a: CountMinSketchState,
  b: CountMinSketchState,
): CountMinSketchState {
  const sameSeeds = a.seeds.every((s, i) => s === b.seeds[i]);
  if (a.width !== b.width || a.depth !== b.depth || !sameSeeds) {
    throw new Error('Cannot merge Count-Min Sketches with different dimensions');
  }

  const merged = new Float64Array(a.table.length);
  for (let i = 0; i < merged.length; i++) {
    merged[i] = a.table[i]! + b.table[i]!;
  }

  return {
    table: merged,
    width: a.width,
    depth: a.depth,
    seeds: Uint32Array.from(a.seeds),
    total: a.total + b.total,
  };
}

// ---------------------------------------------------------------------------
// Heavy hitters
// ---------------------------------------------------------------------------
// The sketch cannot enumerate keys, so a bounded candidate set rides along.
// A new key displaces the candidate with the lowest current estimate only if
// its own estimate is higher.
// ---------------------------------------------------------------------------

export function createHeavyHitters(config: HeavyHittersConfig): HeavyHittersState {
  requireInteger('capacity', config.capacity, 1);
  return {
    sketch: createCountMinSketch(config.sketch),
    capacity: config.capacity,
    candidates: new Map(),
  };
}

/** Feed `key` into the sketch and update the candidate set. */
export function heavyHittersObserve(state: HeavyHittersState, key: string, count = 1): void {
  cmsAdd(state.sketch, key, count);
  const estimate = cmsEstimate(state.sketch, key);

  if (state.candidates.has(key) || state.candidates.size < state.capacity) {
    state.candidates.set(key, estimate);
    return;
  }

  let weakestKey: string | null = null;
  let weakest = Infinity;
  for (const candidate of state.candidates.keys()) {
    const current = cmsEstimate(state.sketch, candidate);
    state.candidates.set(candidate, current);
    if (current < weakest) {
      weakest = current;
      weakestKey = candidate;
    }
  }

  if (weakestKey !== null && estimate > weakest) {
    state.candidates.delete(weakestKey);
    state.candidates.set(key, estimate);
  }
}

function rankedCandidates(state: HeavyHittersState): HeavyHitter[] {
  const ranked: HeavyHitter[] = [];
  for (const key of state.candidates.keys()) {
    ranked.push({ key, estimate: cmsEstimate(state.sketch, key) });
  }
  ranked.sort((a, b) => b.estimate - a.estimate || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  return ranked;
}

/** The `n` candidates with the highest estimates, highest first. */
export function heavyHittersTop(state: HeavyHittersState, n: number): HeavyHitter[] {
  return rankedCandidates(state).slice(0, Math.max(0, n));
}

/** Candidates whose estimate is at least `threshold`, highest first. */
export function heavyHittersAbove(state: HeavyHittersState, threshold: number): HeavyHitter[] {
  return rankedCandidates(state).filter((h) => h.estimate >= threshold);
}
