// ---------------------------------------------------------------------------
// Streaming Estimators — Barrel export
// ---------------------------------------------------------------------------

export {
  createBloomFilter,
  bloomInsert,
  bloomContains,
  bloomFalsePositiveRate,
  bloomMerge,
} from './bloom-filter.js';

export {
  createCountMinSketch,
  cmsAdd,
  cmsEstimate,
  cmsErrorBound,
  cmsMerge,
  createHeavyHitters,
  heavyHittersObserve,
  heavyHittersTop,
  heavyHittersAbove,
} from './count-min.js';

export {
  createHyperLogLog,
  hllAdd,
  hllCount,
  hllMerge,
  hllStandardError,
} from './hyperloglog.js';

export {
  createMinHashSampler,
  samplerConsider,
  samplerSample,
  samplerSize,
} from './min-hash-sampler.js';

export {
  createExponentialHistogram,
  ehAddBit,
  ehQuery,
  ehBuckets,
} from './exponential-histogram.js';

export { createAmsSketch, amsUpdate, amsEstimate } from './ams-sketch.js';

export {
  createRunningMoments,
  momentsUpdate,
  momentsMerge,
  momentsMean,
  momentsVariance,
  momentsSkewness,
  momentsKurtosis,
  momentsSummary,
} from './running-moments.js';
