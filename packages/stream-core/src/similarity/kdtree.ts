// ---------------------------------------------------------------------------
// Similarity Search — k-d Tree
// ---------------------------------------------------------------------------
// Median-split k-d tree over standardized feature vectors, queried for the
// k nearest athletes by Euclidean distance.
// ---------------------------------------------------------------------------

import type { KDTreeNode, NearestResult } from '../types.js';

// ---------------------------------------------------------------------------
// Build
// ---------------------------------------------------------------------------

/**
 * Build a k-d tree from `points` (each of length `dimensions`) with parallel
 * `ids`. Split dimensions cycle with depth; each split is at the median.
 *
 * @returns Root of the tree, or null if there are no points.
 */
export function buildKDTree(
  points: Float64Array[],
  ids: string[],
  dimensions: number,
): KDTreeNode | null {
  if (points.length === 0) return null;

  const indices = new Array<number>(points.length);
  for (let i = 0; i < points.length; i++) indices[i] = i;

  return buildRecursive(points, ids, indices, 0, indices.length, 0, dimensions);
}

function buildRecursive(
  points: Float64Array[],
  ids: string[],
  indices: number[],
  lo: number,
  hi: number,
  depth: number,
  dimensions: number,
): KDTreeNode | null {
  const count = hi - lo;
  if (count <= 0) return null;

  const splitDim = depth % dimensions;

  if (count === 1) {
    const idx = indices[lo]!;
    return { point: points[idx]!, id: ids[idx]!, splitDimension: splitDim, left: null, right: null };
  }

  // Sort the slice along the split dimension; ids break ties so the layout is
  // deterministic for duplicate feature values.
  const slice = indices.slice(lo, hi).sort(
    (a, b) => points[a]![splitDim]! - points[b]![splitDim]! || compareIds(ids[a]!, ids[b]!),
  );
  for (let i = 0; i < slice.length; i++) indices[lo + i] = slice[i]!;

  const medianOffset = lo + ((count - 1) >> 1);
  const medianIdx = indices[medianOffset]!;

  return {
    point: points[medianIdx]!,
    id: ids[medianIdx]!,
    splitDimension: splitDim,
    left: buildRecursive(points, ids, indices, lo, medianOffset, depth + 1, dimensions),
    right: buildRecursive(points, ids, indices, medianOffset + 1, hi, depth + 1, dimensions),
  };
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ---------------------------------------------------------------------------
// k-Nearest Neighbors
// ---------------------------------------------------------------------------

/**
 * Max-heap of fixed capacity tracking the best k so far. The root is the
 * farthest of them, which is the pruning radius.
 */
interface MaxHeap {
  readonly items: NearestResult[];
  readonly capacity: number;
}

function heapPush(heap: MaxHeap, item: NearestResult): void {
  if (heap.items.length < heap.capacity) {
    heap.items.push(item);
    let i = heap.items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (heap.items[parent]!.distance >= heap.items[i]!.distance) break;
      const tmp = heap.items[parent]!;
      heap.items[parent] = heap.items[i]!;
      heap.items[i] = tmp;
      i = parent;
    }
  } else if (item.distance < heap.items[0]!.distance) {
    heap.items[0] = item;
    heapSiftDown(heap, 0);
  }
}

function heapSiftDown(heap: MaxHeap, i: number): void {
  const n = heap.items.length;
  for (;;) {
    let largest = i;
    const left = 2 * i + 1;
    const right = 2 * i + 2;
    if (left < n && heap.items[left]!.distance > heap.items[largest]!.distance) largest = left;
    if (right < n && heap.items[right]!.distance > heap.items[largest]!.distance) largest = right;
    if (largest === i) break;
    const tmp = heap.items[i]!;
    heap.items[i] = heap.items[largest]!;
    heap.items[largest] = tmp;
    i = largest;
  }
}

function heapWorstDist(heap: MaxHeap): number {
  if (heap.items.length < heap.capacity) return Infinity;
  return heap.items[0]!.distance;
}

/**
 * The `k` points nearest to `query`, closest first. Nodes rejected by
 * `accept` are skipped (used to leave the query athlete out of its own
 * neighbor list).
 */
export function kdTreeNearestN(
  root: KDTreeNode,
  query: Float64Array,
  k: number,
  dimensions: number,
  accept: (id: string) => boolean = () => true,
): NearestResult[] {
  const heap: MaxHeap = { items: [], capacity: k };
  if (k > 0) nearestSearch(root, query, heap, dimensions, accept);

  heap.items.sort((a, b) => a.distance - b.distance || compareIds(a.id, b.id));
  return heap.items;
}

function nearestSearch(
  node: KDTreeNode | null,
  query: Float64Array,
  heap: MaxHeap,
  dimensions: number,
  accept: (id: string) => boolean,
): void {
  if (node === null) return;

  if (accept(node.id)) {
    let distSq = 0;
    for (let d = 0; d < dimensions; d++) {
      const diff = query[d]! - node.point[d]!;
      distSq += diff * diff;
    }
    heapPush(heap, { id: node.id, distance: Math.sqrt(distSq), point: node.point });
  }

  const splitDim = node.splitDimension;
  const diff = query[splitDim]! - node.point[splitDim]!;

  const nearer = diff <= 0 ? node.left : node.right;
  const farther = diff <= 0 ? node.right : node.left;

  nearestSearch(nearer, query, heap, dimensions, accept);

  // Only cross the splitting plane if it is closer than the current worst.
  if (Math.abs(diff) <= heapWorstDist(heap)) {
    nearestSearch(farther, query, heap, dimensions, accept);
  }
}

/** Total number of nodes in the tree. */
export function kdTreeSize(root: KDTreeNode | null): number {
  if (root === null) return 0;
  return 1 + kdTreeSize(root.left) + kdTreeSize(root.right);
}
