export { buildKDTree, kdTreeNearestN, kdTreeSize } from './kdtree.js';
export {
  createSimilarityIndex,
  findSimilar,
  standardize,
  type FindSimilarOptions,
} from './athlete-index.js';
