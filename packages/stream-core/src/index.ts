// ---------------------------------------------------------------------------
// @athlete-pulse/stream-core — Streaming Estimators
// ---------------------------------------------------------------------------
// Bounded-memory summaries of the athlete event stream plus similarity search.
// ---------------------------------------------------------------------------

// Infrastructure: types, PRNG, hash utilities
export * from './types.js';

// Sketches, samplers and accumulators
export * from './streaming/index.js';

// Nearest-athlete search
export * from './similarity/index.js';
