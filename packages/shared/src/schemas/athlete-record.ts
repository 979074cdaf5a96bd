import { z } from 'zod'
import {
  PERFORMANCE_STATES,
  PLAY_TYPES,
  SPORTS,
  type PerformanceEvent,
} from '@athlete-pulse/types'

/**
 * A numeric reading that may arrive as a number or as a string carrying a
 * unit suffix ("12.5 m/s", "78%"). The suffix is stripped before parsing.
 */
function measurement(suffix: RegExp) {
  return z.union([
    z.number(),
    z
      .string()
      .transform((s) => s.trim().replace(suffix, '').trim())
      .pipe(z.string().regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric reading'))
      .transform(Number),
  ])
}

const percentage = measurement(/\s*%$/).pipe(z.number().min(0).max(100))

export const athleteRecordSchema = z.object({
  _id: z.string().min(1).max(200).optional(),
  player: z.string().min(1, 'Player is required').max(200),
  sport: z.enum(SPORTS),
  playType: z.enum(PLAY_TYPES).default('offensive'),
  performancePeak: z.boolean().default(false),
  performanceData: z.object({
    speed: measurement(/\s*m\/s$/i).pipe(z.number().min(0).max(100)),
    accuracy: percentage,
    stamina: percentage,
  }),
  performanceState: z.enum(PERFORMANCE_STATES).optional(),
  // Labels outside the configured state set are accepted and ignored downstream.
  previousPerformanceState: z.string().min(1).max(50).optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
})

export type AthleteRecordInput = z.input<typeof athleteRecordSchema>
export type AthleteRecord = z.output<typeof athleteRecordSchema>

/**
 * Convert a validated ingest record into the event the analytics cores consume.
 * `fallbackId` is used when the record carries no `_id`; `now` (ms) when it
 * carries no timestamp.
 */
export function toPerformanceEvent(
  record: AthleteRecord,
  fallbackId: string,
  now: number,
): PerformanceEvent {
  const transition =
    record.previousPerformanceState !== undefined && record.performanceState !== undefined
      ? { from: record.previousPerformanceState, to: record.performanceState }
      : undefined

  return {
    athleteId: record._id ?? fallbackId,
    player: record.player,
    sport: record.sport,
    playType: record.playType,
    speed: record.performanceData.speed,
    accuracy: record.performanceData.accuracy,
    stamina: record.performanceData.stamina,
    peak: record.performancePeak,
    ...(transition ? { transition } : {}),
    ...(record.performanceState ? { state: record.performanceState } : {}),
    timestamp: record.timestamp !== undefined ? Date.parse(record.timestamp) : now,
  }
}
