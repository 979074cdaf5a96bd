import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  ConfigError,
  buildKDTree,
  kdTreeNearestN,
  kdTreeSize,
  createSimilarityIndex,
  findSimilar,
  standardize,
} from '../index.js';

// ===================================================================
// k-d Tree
// ===================================================================

describe('k-d tree', () => {
  it('is null for no points', () => {
    expect(buildKDTree([], [], 2)).toBeNull();
    expect(kdTreeSize(null)).toBe(0);
  });

  it('holds every point', () => {
    const points = [[0, 0], [1, 5], [3, 2], [7, 7], [2, 9]].map((p) => Float64Array.from(p));
    const root = buildKDTree(points, ['a', 'b', 'c', 'd', 'e'], 2);
    expect(kdTreeSize(root)).toBe(5);
  });

  it('finds the nearest points closest first', () => {
    const points = [[0, 0], [1, 0], [5, 5], [0, 2]].map((p) => Float64Array.from(p));
    const root = buildKDTree(points, ['a', 'b', 'c', 'd'], 2);
    if (root === null) throw new Error('expected a tree');

    const result = kdTreeNearestN(root, Float64Array.from([0, 0]), 3, 2);
    expect(result.map((r) => r.id)).toEqual(['a', 'b', 'd']);
    expect(result.map((r) => r.distance)).toEqual([0, 1, 2]);
  });

  it('skips rejected ids', () => {
    const points = [[0, 0], [1, 0], [5, 5]].map((p) => Float64Array.from(p));
    const root = buildKDTree(points, ['a', 'b', 'c'], 2);
    if (root === null) throw new Error('expected a tree');

    const result = kdTreeNearestN(root, Float64Array.from([0, 0]), 5, 2, (id) => id !== 'a');
    expect(result.map((r) => r.id)).toEqual(['b', 'c']);
  });

  it('agrees with a linear scan', () => {
    const point = fc.tuple(
      fc.integer({ min: -50, max: 50 }),
      fc.integer({ min: -50, max: 50 }),
      fc.integer({ min: -50, max: 50 }),
    );
    fc.assert(
      fc.property(
        fc.array(point, { minLength: 1, maxLength: 60 }),
        point,
        fc.integer({ min: 1, max: 8 }),
        (raw, q, k) => {
          const points = raw.map((p) => Float64Array.from(p));
          const ids = raw.map((_, i) => `p${i}`);
          const root = buildKDTree(points, ids, 3);
          if (root === null) throw new Error('expected a tree');
          const query = Float64Array.from(q);

          const expected = points
            .map((p) => Math.hypot(p[0]! - q[0], p[1]! - q[1], p[2]! - q[2]))
            .sort((a, b) => a - b)
            .slice(0, k);
          const actual = kdTreeNearestN(root, query, k, 3).map((r) => r.distance);

          expect(actual).toHaveLength(expected.length);
          actual.forEach((d, i) => expect(d).toBeCloseTo(expected[i]!, 9));
        },
      ),
    );
  });
});

// ===================================================================
// Athlete similarity index
// ===================================================================

describe('similarity index', () => {
  const entries = [
    { id: 'a', features: [0, 0] },
    { id: 'b', features: [1, 1] },
    { id: 'c', features: [10, 10] },
    { id: 'd', features: [0, 1] },
  ];

  it('records column means and population standard deviations', () => {
    const index = createSimilarityIndex(entries);
    expect(index.size).toBe(4);
    expect(index.dimensions).toBe(2);
    expect(index.means[0]).toBeCloseTo(2.75, 12);
    expect(index.means[1]).toBeCloseTo(3, 12);
    expect(index.stdDevs[0]).toBeCloseTo(Math.sqrt(70.75 / 4), 12);
    expect(index.stdDevs[1]).toBeCloseTo(Math.sqrt(16.5), 12);
  });

  it('ranks standardized neighbours and excludes the query athlete', () => {
    const index = createSimilarityIndex(entries);
    const matches = findSimilar(index, [0, 0], 3, { excludeId: 'a' });

    expect(matches.map((m) => [m.id, m.rank])).toEqual([
      ['d', 1],
      ['b', 2],
      ['c', 3],
    ]);
    expect(matches[0]!.distance).toBeCloseTo(1 / Math.sqrt(16.5), 12);
  });

  it('maps a constant column to zero', () => {
    const index = createSimilarityIndex([
      { id: 'x', features: [1, 7] },
      { id: 'y', features: [3, 7] },
    ]);
    expect(Array.from(standardize(index, [2, 100]))).toEqual([0, 0]);
  });

  it('returns nothing from an empty index', () => {
    const index = createSimilarityIndex([]);
    expect(index.root).toBeNull();
    expect(findSimilar(index, [1, 2], 5)).toEqual([]);
  });

  it('rejects mixed feature lengths', () => {
    expect(() =>
      createSimilarityIndex([
        { id: 'x', features: [1, 2] },
        { id: 'y', features: [1] },
      ]),
    ).toThrow(ConfigError);
  });

  it('rejects a query of the wrong dimension', () => {
    const index = createSimilarityIndex(entries);
    expect(() => findSimilar(index, [1, 2, 3], 2)).toThrow(ConfigError);
  });
});
