// ---------------------------------------------------------------------------
// Streaming Estimators — Exponential Histogram (DGIM)
// ---------------------------------------------------------------------------
// Approximate count of 1-bits (e.g. performance peaks) inside a trailing time
// window. Runs of 1s are summarized in power-of-two buckets, newest first,
// with at most two buckets of any size, so memory is O(log window).
// ---------------------------------------------------------------------------

import type {
  ExponentialHistogramConfig,
  ExponentialHistogramState,
  HistogramBucket,
} from '../types.js';
import { ConfigError } from '../types.js';

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * @throws ConfigError unless windowSize is a positive finite number.
 */
export function createExponentialHistogram(
  config: ExponentialHistogramConfig,
): ExponentialHistogramState {
  const w = config.windowSize;
  if (!Number.isFinite(w) || w <= 0) {
    throw new ConfigError(`windowSize must be a positive number, got ${w}`);
  }
  return { windowSize: w, buckets: [] };
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

/** Drop buckets whose timestamp is older than now - window. */
function evict(state: ExponentialHistogramState, now: number): void {
  const cutoff = now - state.windowSize;
  const buckets = state.buckets;
  let keep = buckets.length;
  // Newest first, so expired buckets form a suffix.
  while (keep > 0 && buckets[keep - 1]!.timestamp < cutoff) keep--;
  if (keep < buckets.length) buckets.length = keep;
}

/**
 * Whenever three consecutive buckets share a size, fold the two older ones
 * into a single bucket of double size carrying the newer timestamp. The scan
 * continues from the merged bucket since it may complete a triple of the next
 * size up.
 */
function mergeTriples(buckets: HistogramBucket[]): void {
  let i = 0;
  while (i + 2 < buckets.length) {
    const a = buckets[i]!;
    const b = buckets[i + 1]!;
    const c = buckets[i + 2]!;
    if (a.size === b.size && b.size === c.size) {
      buckets.splice(i + 1, 2, { timestamp: b.timestamp, size: b.size * 2 });
    }
    i++;
  }
}

// ---------------------------------------------------------------------------
// Add / Query
// ---------------------------------------------------------------------------

/**
 * Record one bit observed at `timestamp`. A 0-bit only advances eviction.
 */
export function ehAddBit(
  state: ExponentialHistogramState,
  bit: boolean | 0 | 1,
  timestamp: number,
): void {
  if (bit) {
    state.buckets.unshift({ timestamp, size: 1 });
    mergeTriples(state.buckets);
  }
  evict(state, timestamp);
}

/**
 * Approximate number of 1-bits in (timestamp - window, timestamp].
 *
 * Every live bucket counts in full except the oldest, which may straddle the
 * window boundary and counts for half (floor(size / 2) is taken off). The
 * estimate is within 50% of the true count.
 */
export function ehQuery(state: ExponentialHistogramState, timestamp: number): number {
  evict(state, timestamp);

  const buckets = state.buckets;
  if (buckets.length === 0) return 0;

  let total = 0;
  for (const b of buckets) total += b.size;
  return total - Math.floor(buckets[buckets.length - 1]!.size / 2);
}

/** Snapshot of the bucket list, newest first. */
export function ehBuckets(state: ExponentialHistogramState): readonly HistogramBucket[] {
  return state.buckets.slice();
}
