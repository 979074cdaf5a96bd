// ---------------------------------------------------------------------------
// Similarity Search — Athlete Index
// ---------------------------------------------------------------------------
// Standardizes each feature column (z-score) so speed in m/s and accuracy in
// percent weigh the same, then indexes the vectors in a k-d tree.
// ---------------------------------------------------------------------------

import type { SimilarMatch, SimilarityEntry, SimilarityIndex } from '../types.js';
import { ConfigError } from '../types.js';
import { createRunningMoments, momentsMean, momentsUpdate } from '../streaming/running-moments.js';
import { buildKDTree, kdTreeNearestN } from './kdtree.js';

export interface FindSimilarOptions {
  /** Leave this id out of the results (the athlete being queried). */
  excludeId?: string;
}

/**
 * Build an index over `entries`. Column statistics use the population
 * standard deviation; a column with no spread standardizes to 0.
 *
 * @throws ConfigError if feature vectors differ in length or are empty.
 */
export function createSimilarityIndex(entries: readonly SimilarityEntry[]): SimilarityIndex {
  if (entries.length === 0) {
    return {
      dimensions: 0,
      means: new Float64Array(0),
      stdDevs: new Float64Array(0),
      root: null,
      size: 0,
    };
  }

  const dimensions = entries[0]!.features.length;
  if (dimensions === 0) throw new ConfigError('feature vectors must not be empty');

  const columns = Array.from({ length: dimensions }, () => createRunningMoments());
  for (const entry of entries) {
    if (entry.features.length !== dimensions) {
      throw new ConfigError(
        `feature vector for ${entry.id} has ${entry.features.length} values, expected ${dimensions}`,
      );
    }
    for (let d = 0; d < dimensions; d++) momentsUpdate(columns[d]!, entry.features[d]!);
  }

  const means = new Float64Array(dimensions);
  const stdDevs = new Float64Array(dimensions);
  for (let d = 0; d < dimensions; d++) {
    const col = columns[d]!;
    means[d] = momentsMean(col);
    stdDevs[d] = col.n > 0 ? Math.sqrt(col.m2 / col.n) : 0;
  }

  const index: SimilarityIndex = { dimensions, means, stdDevs, root: null, size: entries.length };
  const points = entries.map((e) => standardize(index, e.features));
  const ids = entries.map((e) => e.id);

  return { ...index, root: buildKDTree(points, ids, dimensions) };
}

/** Z-score `features` with the index's column statistics. */
export function standardize(index: SimilarityIndex, features: readonly number[]): Float64Array {
  const out = new Float64Array(index.dimensions);
  for (let d = 0; d < index.dimensions; d++) {
    const sd = index.stdDevs[d]!;
    out[d] = sd > 0 ? (features[d]! - index.means[d]!) / sd : 0;
  }
  return out;
}

/**
 * The `k` indexed athletes closest to `features`, nearest first, ranked from 1.
 *
 * @throws ConfigError if `features` does not match the index dimension.
 */
export function findSimilar(
  index: SimilarityIndex,
  features: readonly number[],
  k: number,
  options: FindSimilarOptions = {},
): SimilarMatch[] {
  if (index.root === null || k <= 0) return [];
  if (features.length !== index.dimensions) {
    throw new ConfigError(
      `query has ${features.length} features, index expects ${index.dimensions}`,
    );
  }

  const { excludeId } = options;
  const accept = excludeId === undefined ? undefined : (id: string) => id !== excludeId;
  const nearest = kdTreeNearestN(
    index.root,
    standardize(index, features),
    Math.floor(k),
    index.dimensions,
    accept,
  );

  return nearest.map((n, i) => ({ id: n.id, distance: n.distance, rank: i + 1 }));
}
