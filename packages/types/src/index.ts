// Normalized event record, performance-state labels and feed event types.

/** Unique identifier for an athlete */
export type AthleteId = string

/** Labels of the performance-state Markov chain, in matrix order. */
export const PERFORMANCE_STATES = ['peak', 'good', 'average', 'declining', 'injured'] as const

export type PerformanceState = (typeof PERFORMANCE_STATES)[number]

/** Sports and play types the ingest schema accepts. */
export const SPORTS = ['football', 'basketball', 'soccer', 'tennis', 'hockey'] as const

export type Sport = (typeof SPORTS)[number]

export const PLAY_TYPES = ['offensive', 'defensive', 'special', 'transition'] as const

export type PlayType = (typeof PLAY_TYPES)[number]

// Domain event types
export {
  assertNever,
  type PerformanceEvent,
  type StateTransition,
  type FeedEvent,
  type FeedEventType,
  type AthleteProcessed,
  type SnapshotPublished,
  type Heartbeat,
} from './events.js'
