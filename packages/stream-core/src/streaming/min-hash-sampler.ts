// ---------------------------------------------------------------------------
// Streaming Estimators — Min-Hash Sampler
// ---------------------------------------------------------------------------
// Keeps the k distinct items with the smallest 64-bit hashes. Because the hash
// ranks items in a fixed pseudo-random order, the retained set is a uniform
// sample of every distinct item ever offered, in O(k) memory.
// ---------------------------------------------------------------------------

import type { MinHashSamplerConfig, MinHashSamplerState, SampleEntry } from '../types.js';
import { hash64, requireInteger } from '../types.js';

// ---------------------------------------------------------------------------
// Create
// ---------------------------------------------------------------------------

/**
 * @throws ConfigError unless k is an integer >= 1.
 */
export function createMinHashSampler(config: MinHashSamplerConfig): MinHashSamplerState {
  requireInteger('k', config.k, 1);
  return {
    k: config.k,
    seed: config.seed ?? 0,
    heap: [],
    held: new Set(),
  };
}

// ---------------------------------------------------------------------------
// Max-heap on hash
// ---------------------------------------------------------------------------

function siftUp(heap: SampleEntry[], idx: number): void {
  while (idx > 0) {
    const parentIdx = (idx - 1) >> 1;
    const parent = heap[parentIdx]!;
    const current = heap[idx]!;
    if (parent.hash >= current.hash) break;
    heap[parentIdx] = current;
    heap[idx] = parent;
    idx = parentIdx;
  }
}

function siftDown(heap: SampleEntry[], idx: number): void {
  const len = heap.length;
  for (;;) {
    let largest = idx;
    const left = 2 * idx + 1;
    const right = 2 * idx + 2;
    if (left < len && heap[left]!.hash > heap[largest]!.hash) largest = left;
    if (right < len && heap[right]!.hash > heap[largest]!.hash) largest = right;
    if (largest === idx) break;
    const tmp = heap[idx]!;
    heap[idx] = heap[largest]!;
    heap[largest] = tmp;
    idx = largest;
  }
}

// ---------------------------------------------------------------------------
// Consider / Sample
// ---------------------------------------------------------------------------

/**
 * Offer `item` (already serialized) to the sampler.
 *
 * Below k entries the item is inserted. At capacity it replaces the current
 * maximum only when its hash is strictly smaller, so on a tie the entry
 * already held is kept. An item whose hash is already held is ignored.
 */
export function samplerConsider(state: MinHashSamplerState, item: string): void {
  const hash = hash64(item, state.seed);
  if (state.held.has(hash)) return;

  const heap = state.heap;
  if (heap.length < state.k) {
    heap.push({ hash, item });
    state.held.add(hash);
    siftUp(heap, heap.length - 1);
    return;
  }

  const top = heap[0]!;
  if (hash < top.hash) {
    state.held.delete(top.hash);
    state.held.add(hash);
    heap[0] = { hash, item };
    siftDown(heap, 0);
  }
}

/** Current sample. Order is not significant. */
export function samplerSample(state: MinHashSamplerState): string[] {
  return state.heap.map((entry) => entry.item);
}

export function samplerSize(state: MinHashSamplerState): number {
  return state.heap.length;
}
