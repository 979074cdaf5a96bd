// ---------------------------------------------------------------------------
// @athlete-pulse/stream-core — Streaming Estimators
// ---------------------------------------------------------------------------
// Shared types, seeded PRNG, hash utilities and configuration errors for the
// sketches, samplers and accumulators in this package.
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Raised at construction time when a sketch receives invalid parameters. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Throw a ConfigError unless `value` is an integer >= `min`. */
export function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

// ---------------------------------------------------------------------------
// Random number generation
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning values in [0, 1). */
export type PRNG = () => number;

/**
 * Creates a seedable mulberry32 PRNG returning values in [0, 1).
 * Deterministic: identical seeds produce identical sequences.
 */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw `count` 32-bit hash seeds from a PRNG seeded with `seed`.
 * Each sketch stores its own list, so two instances never share or perturb
 * each other's randomness.
 */
export function deriveSeeds(seed: number, count: number): Uint32Array {
  const rng = createPRNG(seed);
  const seeds = new Uint32Array(count);
  for (let i = 0; i < count; i++) {
    seeds[i] = Math.floor(rng() * 4294967296) >>> 0;
  }
  return seeds;
}

// ---------------------------------------------------------------------------
// Hash utilities
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();

/**
 * MurmurHash3 (x86, 32-bit) over raw bytes.
 *
 * Reference: Austin Appleby, MurmurHash3 (public domain).
 */
export function murmurHash3Bytes(data: Uint8Array, seed: number): number {
  let h = seed | 0;
  const len = data.length;

  const nBlocks = len >> 2;
  for (let i = 0; i < nBlocks; i++) {
    const i4 = i << 2;
    let k =
      data[i4]! |
      (data[i4 + 1]! << 8) |
      (data[i4 + 2]! << 16) |
      (data[i4 + 3]! << 24);

    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);

    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  // Tail (avoid fallthrough switch for noFallthroughCasesInSwitch)
  const tailStart = nBlocks << 2;
  const remainder = len & 3;
  if (remainder > 0) {
    let k1 = 0;
    if (remainder >= 3) k1 ^= data[tailStart + 2]! << 16;
    if (remainder >= 2) k1 ^= data[tailStart + 1]! << 8;
    k1 ^= data[tailStart]!;
    k1 = Math.imul(k1, 0xcc9e2d51);
    k1 = (k1 << 15) | (k1 >>> 17);
    k1 = Math.imul(k1, 0x1b873593);
    h ^= k1;
  }

  // Finalization mix
  h ^= len;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;

  return h >>> 0;
}

/** MurmurHash3 (32-bit) of the UTF-8 encoding of `key`. */
export function murmurHash3_32(key: string, seed: number): number {
  return murmurHash3Bytes(encoder.encode(key), seed);
}

const HIGH_WORD_SALT = 0x9e3779b9;

/**
 * 64-bit hash of `key`: two MurmurHash3 evaluations under distinct seeds form
 * the high and low words.
 *
 * Not cryptographic. Among n distinct keys the chance of any collision is
 * roughly n^2 / 2^65 (about 3e-8 for a million keys), where a 256-bit digest
 * would make it negligible.
 */
export function hash64(key: string, seed: number): bigint {
  const data = encoder.encode(key);
  const high = murmurHash3Bytes(data, (seed ^ HIGH_WORD_SALT) >>> 0);
  const low = murmurHash3Bytes(data, seed >>> 0);
  return (BigInt(high) << 32n) | BigInt(low);
}

// ---------------------------------------------------------------------------
// Membership filter
// ---------------------------------------------------------------------------

export interface BloomFilterConfig {
  /** Number of distinct keys the filter is sized for. */
  readonly capacity: number;
  /** Target false positive rate at `capacity`, in (0, 1). */
  readonly errorRate: number;
  readonly seed?: number;
}

export interface BloomFilterState {
  readonly bits: Uint8Array;
  /** Bit array length m. */
  readonly size: number;
  /** One seed per hash function (k = seeds.length). */
  readonly seeds: Uint32Array;
  /** Insertions so far (duplicates included). */
  count: number;
}

// ---------------------------------------------------------------------------
// Frequency sketch and heavy hitters
// ---------------------------------------------------------------------------

export interface CountMinSketchConfig {
  readonly width: number;
  readonly depth: number;
  readonly seed?: number;
}

export interface CountMinSketchState {
  /** Row-major depth x width counters. */
  readonly table: Float64Array;
  readonly width: number;
  readonly depth: number;
  /** One seed per row. */
  readonly seeds: Uint32Array;
  /** Sum of all counts added. */
  total: number;
}

export interface HeavyHittersConfig {
  readonly sketch: CountMinSketchConfig;
  /** Maximum number of candidate keys kept alongside the sketch. */
  readonly capacity: number;
}

export interface HeavyHittersState {
  readonly sketch: CountMinSketchState;
  readonly capacity: number;
  /** Candidate key -> latest sketch estimate. */
  readonly candidates: Map<string, number>;
}

export interface HeavyHitter {
  readonly key: string;
  readonly estimate: number;
}

// ---------------------------------------------------------------------------
// Distinct counter
// ---------------------------------------------------------------------------

export interface HyperLogLogConfig {
  /** Register addressing bits, 4-18 (default 14). */
  readonly precision?: number;
  readonly seed?: number;
}

export interface HyperLogLogState {
  readonly registers: Uint8Array;
  readonly precision: number;
  readonly numRegisters: number;
  readonly seed: number;
}

// ---------------------------------------------------------------------------
// Min-hash sampler
// ---------------------------------------------------------------------------

export interface MinHashSamplerConfig {
  /** Sample size. */
  readonly k: number;
  readonly seed?: number;
}

export interface SampleEntry {
  readonly hash: bigint;
  readonly item: string;
}

export interface MinHashSamplerState {
  readonly k: number;
  readonly seed: number;
  /** Max-heap on hash: the root is the largest retained hash. */
  readonly heap: SampleEntry[];
  /** Hashes currently held, for skipping repeats of a retained item. */
  readonly held: Set<bigint>;
}

// ---------------------------------------------------------------------------
// Windowed bit-counter
// ---------------------------------------------------------------------------

export interface ExponentialHistogramConfig {
  /** Trailing window length, in the same unit as the timestamps passed in. */
  readonly windowSize: number;
}

export interface HistogramBucket {
  /** Timestamp of the most recent 1-bit the bucket covers. */
  readonly timestamp: number;
  /** Number of 1-bits summarized; always a power of two. */
  readonly size: number;
}

export interface ExponentialHistogramState {
  readonly windowSize: number;
  /** Newest first. */
  buckets: HistogramBucket[];
}

// ---------------------------------------------------------------------------
// Second frequency moment
// ---------------------------------------------------------------------------

export interface AmsSketchConfig {
  /** Number of independent signed accumulators. */
  readonly k: number;
  readonly seed?: number;
}

export interface AmsSketchState {
  readonly seeds: Uint32Array;
  readonly accumulators: Float64Array;
}

// ---------------------------------------------------------------------------
// Running moments
// ---------------------------------------------------------------------------

export interface RunningMomentsState {
  n: number;
  mean: number;
  m2: number;
  m3: number;
  m4: number;
}

export interface MomentsSummary {
  readonly count: number;
  readonly mean: number;
  readonly variance: number;
  readonly skewness: number;
  readonly kurtosis: number;
}

// ---------------------------------------------------------------------------
// Similarity search
// ---------------------------------------------------------------------------

/** A node in a k-d tree. */
export interface KDTreeNode {
  readonly point: Float64Array;
  readonly id: string;
  readonly splitDimension: number;
  readonly left: KDTreeNode | null;
  readonly right: KDTreeNode | null;
}

/** Result of a nearest-neighbor query. */
export interface NearestResult {
  readonly id: string;
  readonly distance: number;
  readonly point: Float64Array;
}

export interface SimilarityEntry {
  readonly id: string;
  readonly features: readonly number[];
}

export interface SimilarityIndex {
  readonly dimensions: number;
  /** Per-column mean and standard deviation used for z-scoring. */
  readonly means: Float64Array;
  readonly stdDevs: Float64Array;
  readonly root: KDTreeNode | null;
  readonly size: number;
}

export interface SimilarMatch {
  readonly id: string;
  readonly distance: number;
  /** 1-based, closest first. */
  readonly rank: number;
}
