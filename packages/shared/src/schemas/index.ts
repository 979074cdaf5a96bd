export {
  athleteRecordSchema,
  toPerformanceEvent,
  type AthleteRecord,
  type AthleteRecordInput,
} from './athlete-record.js'

export {
  predictionRequestSchema,
  similarityQuerySchema,
  markovPredictQuerySchema,
  strategyRequestSchema,
  type PredictionRequest,
  type SimilarityQuery,
  type MarkovPredictQuery,
  type StrategyRequest,
} from './prediction.js'

export {
  engineConfigSchema,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
} from './engine-config.js'
