// ---------------------------------------------------------------------------
// Online Transition Model
// ---------------------------------------------------------------------------
//
// Counts observed transitions between a fixed set of performance states and
// turns them into a smoothed row-stochastic matrix. The matrix is cached and
// invalidated on every write; the derived statistics (stationary
// distribution, periodicity, reachability, mixing time) recompute from it.
// ---------------------------------------------------------------------------

import type {
  MarkovAnalysis,
  Matrix,
  MixingTimeOptions,
  PowerIterationOptions,
  StateDistribution,
  StationaryResult,
  TransitionModelOptions,
} from './types.js';
import { ConfigError, UnknownStateError } from './types.js';
import { boolMatMul, oneHot, powerIteration, support, totalVariation, vecMat } from './linalg.js';

/** Power bound for the aperiodicity check. */
const APERIODIC_MAX_POWER = 10;

/** Probabilities at or below this are treated as absent edges. */
const EDGE_EPSILON = 1e-12;

/**
 * Markov chain over performance states, learned one transition at a time.
 *
 * Updates are single-writer: callers serialize `observeTransition` (the
 * Node event loop does this for the server). Queries never mutate counts.
 */
export class TransitionModel {
  readonly states: readonly string[];
  readonly smoothing: number;

  private readonly index: Map<string, number>;
  private readonly countRows: Float64Array[];
  private cachedMatrix: number[][] | null;
  private observed: number;

  /**
   * @throws ConfigError for an empty or duplicated state list, or a smoothing
   *         constant that is not a positive finite number.
   */
  constructor({ states, smoothing = 1e-3 }: TransitionModelOptions) {
    if (states.length === 0) {
      throw new ConfigError('states must not be empty');
    }
    const index = new Map<string, number>();
    states.forEach((s, i) => index.set(s, i));
    if (index.size !== states.length) {
      throw new ConfigError(`states must be unique, got [${states.join(', ')}]`);
    }
    if (!Number.isFinite(smoothing) || smoothing <= 0) {
      throw new ConfigError(`smoothing must be > 0, got ${smoothing}`);
    }

    this.states = [...states];
    this.smoothing = smoothing;
    this.index = index;
    this.countRows = states.map(() => new Float64Array(states.length));
    this.cachedMatrix = null;
    this.observed = 0;
  }

  get size(): number {
    return this.states.length;
  }

  /** Sum of all observed transition weights. */
  get totalObservations(): number {
    return this.observed;
  }

  hasState(state: string): boolean {
    return this.index.has(state);
  }

  // ---- Updates ----

  /**
   * Record a transition. Unknown labels and weights that are not positive
   * finite numbers are ignored.
   */
  observeTransition(from: string, to: string, weight = 1): void {
    const i = this.index.get(from);
    const j = this.index.get(to);
    if (i === undefined || j === undefined) return;
    if (!Number.isFinite(weight) || weight <= 0) return;

    const row = this.countRows[i]!;
    row[j] = row[j]! + weight;
    this.observed += weight;
    this.cachedMatrix = null;
  }

  // ---- Queries ----

  /** (count + smoothing) normalized per row. Cached until the next write. */
  transitionMatrix(): Matrix {
    if (this.cachedMatrix !== null) return this.cachedMatrix;

    const n = this.size;
    const matrix = this.countRows.map((counts) => {
      let rowSum = 0;
      for (let j = 0; j < n; j++) rowSum += counts[j]! + this.smoothing;
      const row = new Array<number>(n);
      for (let j = 0; j < n; j++) row[j] = (counts[j]! + this.smoothing) / rowSum;
      return row;
    });

    this.cachedMatrix = matrix;
    return matrix;
  }

  /** The matrix keyed by label: table[from][to]. */
  transitionTable(): Record<string, StateDistribution> {
    const matrix = this.transitionMatrix();
    const table: Record<string, StateDistribution> = {};
    this.states.forEach((from, i) => {
      table[from] = this.toDistribution(matrix[i]!);
    });
    return table;
  }

  /** Raw transition counts keyed by label. */
  counts(): Record<string, StateDistribution> {
    const table: Record<string, StateDistribution> = {};
    this.states.forEach((from, i) => {
      table[from] = this.toDistribution(this.countRows[i]!);
    });
    return table;
  }

  /**
   * Distribution over states after `steps` transitions from `state`.
   *
   * @throws UnknownStateError if `state` is not a configured label.
   * @throws RangeError if `steps` is not a non-negative integer.
   */
  predictDistribution(state: string, steps = 1): StateDistribution {
    const start = this.index.get(state);
    if (start === undefined) throw new UnknownStateError(state);
    if (!Number.isInteger(steps) || steps < 0) {
      throw new RangeError(`steps must be a non-negative integer, got ${steps}`);
    }

    const matrix = this.transitionMatrix();
    let v = oneHot(this.size, start);
    for (let s = 0; s < steps; s++) v = vecMat(v, matrix);
    return this.toDistribution(v);
  }

  /**
   * Long-run distribution by power iteration from a uniform start. Not
   * converging within `maxIter` returns the last iterate with
   * `converged: false`.
   */
  stationaryDistribution({ tol = 1e-9, maxIter = 10000 }: PowerIterationOptions = {}): StationaryResult {
    const result = powerIteration(this.transitionMatrix(), { tol, maxIter });
    return {
      distribution: this.toDistribution(result.vector),
      iterations: result.iterations,
      converged: result.converged,
    };
  }

  /**
   * Approximate aperiodicity test.
   *
   * True at once if any state has a self-loop. Otherwise true if, for some
   * power 1..10 of the support matrix, every state can return to itself in
   * exactly that many steps. This is a heuristic: it is not a period (gcd)
   * computation, and chains whose return structure only shows beyond the
   * tenth power are reported as periodic.
   */
  isAperiodic(): boolean {
    const matrix = this.transitionMatrix();
    for (let i = 0; i < this.size; i++) {
      if (matrix[i]![i]! > EDGE_EPSILON) return true;
    }

    const adjacency = support(matrix, EDGE_EPSILON);
    let power = adjacency;
    for (let p = 1; p <= APERIODIC_MAX_POWER; p++) {
      if (power.every((row, i) => row[i])) return true;
      power = boolMatMul(power, adjacency);
    }
    return false;
  }

  /**
   * Approximate irreducibility test over observed (unsmoothed) counts: true
   * iff every state is reachable from the first state. Reachability back to
   * the first state is not checked, so this is not a full strong-connectivity
   * test.
   */
  isIrreducible(): boolean {
    const n = this.size;
    const visited = new Array<boolean>(n).fill(false);
    const stack = [0];
    visited[0] = true;
    let reached = 0;

    for (let u = stack.pop(); u !== undefined; u = stack.pop()) {
      reached++;
      const row = this.countRows[u]!;
      for (let v = 0; v < n; v++) {
        if (row[v]! > 0 && !visited[v]) {
          visited[v] = true;
          stack.push(v);
        }
      }
    }
    return reached === n;
  }

  /**
   * Worst case, over one-hot starting states, of the first step at which the
   * total variation distance to the stationary distribution drops below
   * `tol`. A start that never gets there counts as `maxSteps`.
   */
  mixingTimeApprox({ tol = 1e-3, maxSteps = 1000 }: MixingTimeOptions = {}): number {
    const matrix = this.transitionMatrix();
    const pi = powerIteration(matrix).vector;
    let worst = 0;

    for (let s = 0; s < this.size; s++) {
      let v = oneHot(this.size, s);
      let mixedAt = maxSteps;
      for (let t = 1; t <= maxSteps; t++) {
        v = vecMat(v, matrix);
        if (totalVariation(v, pi) < tol) {
          mixedAt = t;
          break;
        }
      }
      worst = Math.max(worst, mixedAt);
    }
    return worst;
  }

  /** Everything the analytics summary reports about the chain. */
  analyze(): MarkovAnalysis {
    return {
      states: this.states,
      transitions: this.transitionTable(),
      stationary: this.stationaryDistribution(),
      aperiodic: this.isAperiodic(),
      irreducible: this.isIrreducible(),
      mixingTime: this.mixingTimeApprox(),
      totalObservations: this.observed,
    };
  }

  // ---- Internal ----

  private toDistribution(values: ArrayLike<number>): StateDistribution {
    const out: StateDistribution = {};
    this.states.forEach((s, i) => {
      out[s] = values[i]!;
    });
    return out;
  }
}
