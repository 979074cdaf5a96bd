// ---------------------------------------------------------------------------
// Strategy Evaluation
// ---------------------------------------------------------------------------
// Scores coaching actions by adjusting the transition matrix the way the
// action is expected to act, then weighting the long-run state distribution
// of the adjusted chain by a per-state reward.
// ---------------------------------------------------------------------------

import type { Action, ActionEvaluation, Matrix, StateDistribution } from './types.js';
import { ACTIONS } from './types.js';
import { powerIteration } from './linalg.js';

/** Probability mass per row that resting moves off the injury column. */
const REST_SHIFT = 0.05;

/**
 * Copy of `matrix` with `action` applied.
 *
 * - `rest`: in every row, up to 0.05 of the mass headed to `injured` moves to
 *   `good`, then rows are renormalized. Without both labels nothing changes.
 * - `none`: unchanged copy.
 */
export function applyAction(matrix: Matrix, states: readonly string[], action: Action): number[][] {
  const adjusted = matrix.map((row) => [...row]);
  if (action === 'none') return adjusted;

  const injured = states.indexOf('injured');
  const good = states.indexOf('good');
  if (injured < 0 || good < 0) return adjusted;

  return adjusted.map((row) => {
    const delta = Math.min(row[injured]!, REST_SHIFT);
    row[injured] = row[injured]! - delta;
    row[good] = row[good]! + delta;
    const sum = row.reduce((acc, p) => acc + p, 0);
    return sum > 0 ? row.map((p) => p / sum) : row;
  });
}

/**
 * Expected reward per step in the long run under `action`. States missing
 * from `rewardPerState` earn 0.
 */
export function evaluateAction(
  matrix: Matrix,
  states: readonly string[],
  action: Action,
  rewardPerState: Readonly<Record<string, number>>,
): ActionEvaluation {
  const adjusted = applyAction(matrix, states, action);
  const { vector } = powerIteration(adjusted, { tol: 1e-9, maxIter: 1000 });

  let expectedReward = 0;
  const distribution: StateDistribution = {};
  states.forEach((s, i) => {
    const p = vector[i]!;
    distribution[s] = p;
    expectedReward += p * (rewardPerState[s] ?? 0);
  });

  return { action, expectedReward, distribution };
}

/** Every action evaluated, best expected reward first. */
export function rankActions(
  matrix: Matrix,
  states: readonly string[],
  rewardPerState: Readonly<Record<string, number>>,
  actions: readonly Action[] = ACTIONS,
): ActionEvaluation[] {
  return actions
    .map((action) => evaluateAction(matrix, states, action, rewardPerState))
    .sort((a, b) => b.expectedReward - a.expectedReward);
}
