// ---------------------------------------------------------------------------
// @athlete-pulse/markov-core — Performance-State Transitions
// ---------------------------------------------------------------------------

export * from './types.js';
export { vecMat, l1Distance, totalVariation, powerIteration } from './linalg.js';
export { TransitionModel } from './transition-model.js';
export { applyAction, evaluateAction, rankActions } from './strategy.js';
