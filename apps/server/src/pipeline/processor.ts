/**
 * Event processor: owns one instance of every streaming component and routes
 * each normalized performance event through all of them.
 *
 * Single writer. `process` is synchronous, so the event loop serializes calls
 * from the HTTP route and the Redis poller; queries run between updates.
 */

import type { EngineConfig } from '@athlete-pulse/shared'
import type { AthleteId, PerformanceEvent, PerformanceState, SnapshotPublished, Sport } from '@athlete-pulse/types'
import {
  amsEstimate,
  amsUpdate,
  bloomContains,
  bloomFalsePositiveRate,
  bloomInsert,
  cmsErrorBound,
  cmsEstimate,
  createAmsSketch,
  createBloomFilter,
  createExponentialHistogram,
  createHeavyHitters,
  createHyperLogLog,
  createMinHashSampler,
  createRunningMoments,
  createSimilarityIndex,
  deriveSeeds,
  ehAddBit,
  ehQuery,
  findSimilar,
  heavyHittersObserve,
  heavyHittersTop,
  hllAdd,
  hllCount,
  momentsMean,
  momentsSummary,
  momentsUpdate,
  samplerConsider,
  samplerSize,
  type AmsSketchState,
  type BloomFilterState,
  type ExponentialHistogramState,
  type HeavyHitter,
  type HeavyHittersState,
  type HyperLogLogState,
  type MinHashSamplerState,
  type MomentsSummary,
  type RunningMomentsState,
  type SimilarMatch,
  type SimilarityIndex,
} from '@athlete-pulse/stream-core'
import {
  TransitionModel,
  rankActions,
  type ActionEvaluation,
  type MarkovAnalysis,
  type StateDistribution,
} from '@athlete-pulse/markov-core'
import { Rng, simulateSuccessProbability } from '@athlete-pulse/simulation'
import type { Logger } from '../lib/logger.js'
import type { FeedHub } from './feed.js'

export type Component =
  | 'bloom_filter'
  | 'hyperloglog'
  | 'count_min_sketch'
  | 'minwise_sampling'
  | 'running_moments'
  | 'ams_f2'
  | 'dgim'
  | 'markov_chain'
  | 'monte_carlo'
  | 'knn_similarity'

/** Athletes needed before results carry similar athletes. */
const MIN_ATHLETES_FOR_SIMILARITY = 5
/** Nearest athletes carried in each processing result, out of `knnNeighbors`. */
const SIMILAR_IN_RESULT = 3
const TOP_ATHLETES = 10

export interface StreamingStats {
  processed: number
  /** Distinct sport/play type/athlete combinations (HyperLogLog). */
  distinctPlays: number
  /** Play types seen for the first time according to the membership filter. */
  playTypesSeen: number
  bloomFalsePositiveRate: number
  sampleSize: number
  /** Approximate peaks inside the trailing window. */
  windowPeaks: number
  /** Second frequency moment of the integer speed bins. */
  speedF2: number
  /** Additive error bound on any per-athlete frequency. */
  frequencyErrorBound: number
  trackedAthletes: number
}

export interface ProcessingResult {
  athleteId: AthleteId
  applied: Component[]
  firstSeenPlay: boolean
  /** Estimated number of events for this athlete so far. */
  frequency: number
  predictions: {
    nextState: StateDistribution | null
    successProbability: number
  }
  similar: SimilarMatch[]
  stats: StreamingStats
}

export interface AthleteMoments {
  speed: MomentsSummary
  accuracy: MomentsSummary
  stamina: MomentsSummary
}

export interface AthleteSummary extends AthleteMoments {
  athleteId: AthleteId
  player: string
  sport: Sport
  events: number
  lastState: PerformanceState | null
}

export interface AnalyticsSummary {
  generatedAt: string
  processed: number
  topAthletes: (HeavyHitter & { player: string | null })[]
  athletes: AthleteSummary[]
  markov: MarkovAnalysis
  streaming: StreamingStats
}

interface AthleteProfile {
  player: string
  sport: Sport
  lastState: PerformanceState | null
  speed: RunningMomentsState
  accuracy: RunningMomentsState
  stamina: RunningMomentsState
}

export interface ProcessorOptions {
  config: EngineConfig
  feed: FeedHub
  logger: Logger
  /** Milliseconds since the epoch; injectable for tests. */
  clock?: () => number
}

export class EventProcessor {
  private readonly config: EngineConfig
  private readonly feed: FeedHub
  private readonly logger: Logger
  private readonly clock: () => number

  private readonly playTypes: BloomFilterState
  private readonly distinctPlays: HyperLogLogState
  private readonly frequencies: HeavyHittersState
  private readonly peakSample: MinHashSamplerState
  private readonly peakWindow: ExponentialHistogramState
  private readonly speedBins: AmsSketchState
  private readonly transitions: TransitionModel
  private readonly rng: Rng

  private readonly athletes = new Map<AthleteId, AthleteProfile>()
  private similarityIndex: SimilarityIndex | null = null
  private processedCount = 0
  private playTypesSeen = 0

  constructor({ config, feed, logger, clock = Date.now }: ProcessorOptions) {
    this.config = config
    this.feed = feed
    this.logger = logger
    this.clock = clock

    const seeds = deriveSeeds(config.seed, 6)
    this.playTypes = createBloomFilter({
      capacity: config.bloomCapacity,
      errorRate: config.bloomErrorRate,
      seed: seeds[0]!,
    })
    this.distinctPlays = createHyperLogLog({ precision: config.hllPrecision, seed: seeds[1]! })
    this.frequencies = createHeavyHitters({
      sketch: { width: config.cmsWidth, depth: config.cmsDepth, seed: seeds[2]! },
      capacity: config.heavyHitterCapacity,
    })
    this.peakSample = createMinHashSampler({ k: config.samplerSize, seed: seeds[3]! })
    this.peakWindow = createExponentialHistogram({ windowSize: config.windowSeconds })
    this.speedBins = createAmsSketch({ k: config.amsK, seed: seeds[4]! })
    this.transitions = new TransitionModel({
      states: config.markovStates,
      smoothing: config.markovSmoothing,
    })
    this.rng = new Rng(seeds[5]!)
  }

  get processed(): number {
    return this.processedCount
  }

  /** Default neighbour count for similarity queries. */
  get neighborCount(): number {
    return this.config.knnNeighbors
  }

  get states(): readonly string[] {
    return this.transitions.states
  }

  hasAthlete(athleteId: AthleteId): boolean {
    return this.athletes.has(athleteId)
  }

  // ---- Updates ----

  process(event: PerformanceEvent): ProcessingResult {
    const applied: Component[] = []
    const nowSeconds = this.clock() / 1000

    // 1. first-seen play types
    const playKey = `${event.sport}:${event.playType}`
    const firstSeenPlay = !bloomContains(this.playTypes, playKey)
    if (firstSeenPlay) {
      bloomInsert(this.playTypes, playKey)
      this.playTypesSeen++
      this.logger.info('play_type_first_seen', { playKey })
    }
    applied.push('bloom_filter')

    // 2. distinct plays
    hllAdd(this.distinctPlays, `${event.sport}|${event.playType}|${event.athleteId}`)
    applied.push('hyperloglog')

    // 3. per-athlete frequency
    heavyHittersObserve(this.frequencies, event.athleteId)
    applied.push('count_min_sketch')

    // 4. uniform sample of peak events
    if (event.peak) samplerConsider(this.peakSample, JSON.stringify(event))
    applied.push('minwise_sampling')

    // 5. per-athlete moments
    const profile = this.profileFor(event)
    momentsUpdate(profile.speed, event.speed)
    momentsUpdate(profile.accuracy, event.accuracy)
    momentsUpdate(profile.stamina, event.stamina)
    if (event.state !== undefined) profile.lastState = event.state
    applied.push('running_moments')

    // 6. speed distribution
    amsUpdate(this.speedBins, Math.floor(event.speed))
    applied.push('ams_f2')

    // 7. peaks in the trailing window, by arrival time
    ehAddBit(this.peakWindow, event.peak, nowSeconds)
    applied.push('dgim')

    // 8-9. transitions and next-state prediction
    if (event.transition !== undefined) {
      this.transitions.observeTransition(event.transition.from, event.transition.to)
    }
    const nextState =
      event.state !== undefined && this.transitions.hasState(event.state)
        ? this.transitions.predictDistribution(event.state, 1)
        : null
    applied.push('markov_chain')

    const { probability } = simulateSuccessProbability(
      { speed: event.speed, accuracy: event.accuracy, stamina: event.stamina },
      { trials: this.config.simulationTrials, rng: this.rng },
    )
    applied.push('monte_carlo')

    // 10. similarity
    this.similarityIndex = null
    const similar =
      this.athletes.size >= MIN_ATHLETES_FOR_SIMILARITY
        ? (this.similarTo(event.athleteId, this.config.knnNeighbors) ?? []).slice(0, SIMILAR_IN_RESULT)
        : []
    applied.push('knn_similarity')

    this.processedCount++

    this.feed.publish({
      type: 'athlete_processed',
      ts: new Date(this.clock()).toISOString(),
      payload: {
        athleteId: event.athleteId,
        player: event.player,
        sport: event.sport,
        state: event.state ?? null,
        peak: event.peak,
      },
    })
    this.logger.debug('athlete_processed', { athleteId: event.athleteId, components: applied.length })

    return {
      athleteId: event.athleteId,
      applied,
      firstSeenPlay,
      frequency: cmsEstimate(this.frequencies.sketch, event.athleteId),
      predictions: { nextState, successProbability: probability },
      similar,
      stats: this.streamingStats(),
    }
  }

  // ---- Queries ----

  streamingStats(): StreamingStats {
    return {
      processed: this.processedCount,
      distinctPlays: hllCount(this.distinctPlays),
      playTypesSeen: this.playTypesSeen,
      bloomFalsePositiveRate: bloomFalsePositiveRate(this.playTypes),
      sampleSize: samplerSize(this.peakSample),
      windowPeaks: ehQuery(this.peakWindow, this.clock() / 1000),
      speedF2: amsEstimate(this.speedBins),
      frequencyErrorBound: cmsErrorBound(this.frequencies.sketch),
      trackedAthletes: this.athletes.size,
    }
  }

  analyticsSummary(): AnalyticsSummary {
    const top = heavyHittersTop(this.frequencies, TOP_ATHLETES)
    const athletes: AthleteSummary[] = []
    for (const { key } of top) {
      const profile = this.athletes.get(key)
      if (profile === undefined) continue
      athletes.push({
        athleteId: key,
        player: profile.player,
        sport: profile.sport,
        events: profile.speed.n,
        lastState: profile.lastState,
        ...momentsOf(profile),
      })
    }

    return {
      generatedAt: new Date(this.clock()).toISOString(),
      processed: this.processedCount,
      topAthletes: top.map((h) => ({ ...h, player: this.athletes.get(h.key)?.player ?? null })),
      athletes,
      markov: this.transitions.analyze(),
      streaming: this.streamingStats(),
    }
  }

  /** Running moments for one athlete, or null if never seen. */
  athleteMoments(athleteId: AthleteId): AthleteMoments | null {
    const profile = this.athletes.get(athleteId)
    return profile === undefined ? null : momentsOf(profile)
  }

  /**
   * The `k` athletes most similar to `athleteId` by standardized mean speed,
   * accuracy and stamina. Null if the athlete is unknown.
   */
  similarTo(athleteId: AthleteId, k: number): SimilarMatch[] | null {
    const profile = this.athletes.get(athleteId)
    if (profile === undefined) return null
    return findSimilar(this.ensureIndex(), featuresOf(profile), k, { excludeId: athleteId })
  }

  /** @throws UnknownStateError for a label outside the configured states. */
  predictState(state: string, steps: number): StateDistribution {
    return this.transitions.predictDistribution(state, steps)
  }

  /** Interventions ranked by long-run expected reward under the learned chain. */
  rankStrategies(rewards: Readonly<Record<string, number>>): ActionEvaluation[] {
    return rankActions(this.transitions.transitionMatrix(), this.transitions.states, rewards)
  }

  snapshotEvent(): SnapshotPublished {
    const stats = this.streamingStats()
    return {
      type: 'snapshot',
      ts: new Date(this.clock()).toISOString(),
      payload: {
        processed: stats.processed,
        distinctPlays: stats.distinctPlays,
        windowPeaks: stats.windowPeaks,
      },
    }
  }

  // ---- Internal ----

  private profileFor(event: PerformanceEvent): AthleteProfile {
    let profile = this.athletes.get(event.athleteId)
    if (profile === undefined) {
      profile = {
        player: event.player,
        sport: event.sport,
        lastState: null,
        speed: createRunningMoments(),
        accuracy: createRunningMoments(),
        stamina: createRunningMoments(),
      }
      this.athletes.set(event.athleteId, profile)
    }
    return profile
  }

  private ensureIndex(): SimilarityIndex {
    if (this.similarityIndex === null) {
      this.similarityIndex = createSimilarityIndex(
        [...this.athletes].map(([id, profile]) => ({ id, features: featuresOf(profile) })),
      )
    }
    return this.similarityIndex
  }
}

function featuresOf(profile: AthleteProfile): number[] {
  return [momentsMean(profile.speed), momentsMean(profile.accuracy), momentsMean(profile.stamina)]
}

function momentsOf(profile: AthleteProfile): AthleteMoments {
  return {
    speed: momentsSummary(profile.speed),
    accuracy: momentsSummary(profile.accuracy),
    stamina: momentsSummary(profile.stamina),
  }
}
