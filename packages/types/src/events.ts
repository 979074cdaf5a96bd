import type { AthleteId, PerformanceState, PlayType, Sport } from './index.js'

// ─── Ingest ──────────────────────────────────────────────────────────────────

/** A (previous, current) pair of performance-state labels. */
export interface StateTransition {
  from: string
  to: string
}

/**
 * One real-world occurrence, already parsed and unit-stripped.
 * Sketches copy out the scalars they need and never retain the record.
 */
export interface PerformanceEvent {
  readonly athleteId: AthleteId
  readonly player: string
  readonly sport: Sport
  readonly playType: PlayType
  /** Speed in m/s */
  readonly speed: number
  /** Accuracy, 0-100 */
  readonly accuracy: number
  /** Stamina, 0-100 */
  readonly stamina: number
  /** Whether this occurrence was a performance peak */
  readonly peak: boolean
  readonly transition?: StateTransition
  readonly state?: PerformanceState
  /** Milliseconds since the Unix epoch */
  readonly timestamp: number
}

// ─── Live feed ───────────────────────────────────────────────────────────────

interface FeedEventBase {
  type: string
  /** ISO-8601 timestamp */
  ts: string
}

export interface AthleteProcessed extends FeedEventBase {
  type: 'athlete_processed'
  payload: {
    athleteId: AthleteId
    player: string
    sport: Sport
    state: PerformanceState | null
    peak: boolean
  }
}

export interface SnapshotPublished extends FeedEventBase {
  type: 'snapshot'
  payload: {
    processed: number
    distinctPlays: number
    windowPeaks: number
  }
}

export interface Heartbeat extends FeedEventBase {
  type: 'heartbeat'
  payload: {
    subscribers: number
  }
}

export type FeedEvent = AthleteProcessed | SnapshotPublished | Heartbeat

export type FeedEventType = FeedEvent['type']

/** Exhaustiveness check for switch statements over feed events. */
export function assertNever(event: never): never {
  throw new Error(`Unhandled feed event: ${JSON.stringify(event)}`)
}
