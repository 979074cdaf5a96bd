// ---------------------------------------------------------------------------
// Dense helpers for small transition matrices
// ---------------------------------------------------------------------------

import type { Matrix, PowerIterationOptions, PowerIterationResult } from './types.js';

/** Row vector times matrix: out[j] = sum_i v[i] * m[i][j]. */
export function vecMat(v: readonly number[], m: Matrix): number[] {
  const n = m.length;
  const out = new Array<number>(n).fill(0);
  for (let i = 0; i < n; i++) {
    const vi = v[i]!;
    if (vi === 0) continue;
    const row = m[i]!;
    for (let j = 0; j < n; j++) out[j] = out[j]! + vi * row[j]!;
  }
  return out;
}

export function l1Distance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += Math.abs(a[i]! - b[i]!);
  return sum;
}

/** Half the L1 distance. */
export function totalVariation(a: readonly number[], b: readonly number[]): number {
  return 0.5 * l1Distance(a, b);
}

export function oneHot(n: number, index: number): number[] {
  const v = new Array<number>(n).fill(0);
  v[index] = 1;
  return v;
}

/**
 * Power iteration v <- vP from a uniform start until the L1 step falls below
 * `tol`. Hitting `maxIter` is not an error: the last iterate comes back with
 * `converged: false`.
 */
export function powerIteration(
  m: Matrix,
  { tol = 1e-9, maxIter = 10000 }: PowerIterationOptions = {},
): PowerIterationResult {
  const n = m.length;
  let v = new Array<number>(n).fill(1 / n);

  for (let it = 1; it <= maxIter; it++) {
    const next = vecMat(v, m);
    const step = l1Distance(next, v);
    v = next;
    if (step < tol) return { vector: v, iterations: it, converged: true };
  }
  return { vector: v, iterations: maxIter, converged: false };
}

/** 0/1 pattern of entries above `epsilon`. */
export function support(m: Matrix, epsilon = 1e-12): boolean[][] {
  return m.map((row) => row.map((p) => p > epsilon));
}

/** Boolean matrix product: reachability in one more step. */
export function boolMatMul(a: readonly (readonly boolean[])[], b: readonly (readonly boolean[])[]): boolean[][] {
  const n = a.length;
  const out: boolean[][] = [];
  for (let i = 0; i < n; i++) {
    const row = new Array<boolean>(n).fill(false);
    for (let k = 0; k < n; k++) {
      if (!a[i]![k]) continue;
      const bk = b[k]!;
      for (let j = 0; j < n; j++) if (bk[j]) row[j] = true;
    }
    out.push(row);
  }
  return out;
}
