// ---------------------------------------------------------------------------
// Streaming Estimators — Bloom Filter
// ---------------------------------------------------------------------------
// Probabilistic set membership ("have I seen this play type before").
// False positives possible, false negatives are not. No removal.
// ---------------------------------------------------------------------------

import type { BloomFilterConfig, BloomFilterState } from '../types.js';
import { ConfigError, deriveSeeds, murmurHash3Bytes, requireInteger } from '../types.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LN2 = Math.LN2;
const LN2_SQ = LN2 * LN2;

const encoder = new TextEncoder();

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * Create a Bloom filter sized for `capacity` keys at the target error rate.
 *
 * Bit array size: m = ceil(-n * ln(p) / (ln2)^2)
 * Hash count:     k = max(1, round(m / n * ln2))
 *
 * Each of the k hash functions is MurmurHash3 under its own seed, drawn from
 * `config.seed` (default 0).
 *
 * @throws ConfigError if capacity is not a positive integer or errorRate is
 *         outside (0, 1).
 */
export function createBloomFilter(config: BloomFilterConfig): BloomFilterState {
  requireInteger('capacity', config.capacity, 1);
  const p = config.errorRate;
  if (!(p > 0 && p < 1)) {
    throw new ConfigError(`errorRate must be in (0, 1), got ${p}`);
  }

  const n = config.capacity;
  const m = Math.ceil((-n * Math.log(p)) / LN2_SQ);
  const k = Math.max(1, Math.round((m / n) * LN2));

  return {
    bits: new Uint8Array(Math.ceil(m / 8)),
    size: m,
    seeds: deriveSeeds(config.seed ?? 0, k),
    count: 0,
  };
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function setBit(bits: Uint8Array, pos: number): void {
  const byteIdx = pos >>> 3;
  bits[byteIdx] = (bits[byteIdx]! | (1 << (pos & 7))) & 0xff;
}

function testBit(bits: Uint8Array, pos: number): boolean {
  return (bits[pos >>> 3]! & (1 << (pos & 7))) !== 0;
}

// ---------------------------------------------------------------------------
// Insert / Contains
// ---------------------------------------------------------------------------

/** Set the k bits for `key`. Mutates state in-place. */
export function bloomInsert(state: BloomFilterState, key: string): void {
  const data = encoder.encode(key);
  for (let i = 0; i < state.seeds.length; i++) {
    setBit(state.bits, murmurHash3Bytes(data, state.seeds[i]!) % state.size);
  }
  state.count++;
}

/**
 * - `true`: the key is *probably* present (may be a false positive).
 * - `false`: the key was *definitely never* inserted.
 */
export function bloomContains(state: BloomFilterState, key: string): boolean {
  const data = encoder.encode(key);
  for (let i = 0; i < state.seeds.length; i++) {
    if (!testBit(state.bits, murmurHash3Bytes(data, state.seeds[i]!) % state.size)) {
      return false;
    }
  }
  return true;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

/**
 * Theoretical false positive rate for the number of insertions so far:
 * (1 - e^(-k * n / m))^k
 */
export function bloomFalsePositiveRate(state: BloomFilterState): number {
  const k = state.seeds.length;
  return Math.pow(1 - Math.exp((-k * state.count) / state.size), k);
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * OR two filters built from the same configuration (size and seeds).
 *
 * @throws If the filters were built differently.
 */
export function bloomMerge(a: BloomFilterState, b: BloomFilterState): BloomFilterState {
  const sameSeeds =
    a.seeds.length === b.seeds.length && a.seeds.every((s, i) => s === b.seeds[i]);
  if (a.size !== b.size || !sameSeeds) {
    throw new Error('Cannot merge Bloom filters with different configurations');
  }

  const merged = new Uint8Array(a.bits.length);
  for (let i = 0; i < merged.length; i++) {
    merged[i] = (a.bits[i]! | b.bits[i]!) & 0xff;
  }

  return {
    bits: merged,
    size: a.size,
    seeds: Uint32Array.from(a.seeds),
    count: a.count + b.count,
  };
}
