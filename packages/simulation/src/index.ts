export * from './types.js'
export { Rng } from './random.js'
export { baseProbability, simulateSuccessProbability } from './outcome.js'
