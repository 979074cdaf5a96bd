import { randomUUID } from 'node:crypto'
import { setTimeout as sleep } from 'node:timers/promises'
import type { EventTimeline } from '@athlete-pulse/cache'
import { athleteRecordSchema, toPerformanceEvent } from '@athlete-pulse/shared'
import { serializeError, type Logger } from '../lib/logger.js'
import type { EventProcessor } from './processor.js'

export interface TimelinePollerOptions {
  timeline: EventTimeline
  processor: EventProcessor
  logger: Logger
  /** Seconds each pop blocks before the loop checks for stop. */
  timeoutSeconds: number
  /** Pause after a failed pop, in ms. */
  retryDelayMs?: number
  now?: () => number
  newId?: () => string
}

export interface TimelinePoller {
  /** Run until `stop()`; resolves once the loop has exited. */
  run(): Promise<void>
  stop(): void
  /** Validate and process one raw entry. False if it was rejected. */
  ingest(raw: string): boolean
}

/**
 * Drains the Redis timeline into the processor. Entries that are not JSON or
 * fail the record schema are logged and skipped.
 */
export function createTimelinePoller(options: TimelinePollerOptions): TimelinePoller {
  const { timeline, processor, logger, timeoutSeconds } = options
  const { retryDelayMs = 1000, now = Date.now, newId = randomUUID } = options
  let running = false

  function ingest(raw: string): boolean {
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (err) {
      logger.warn('timeline_entry_rejected', { reason: 'invalid_json', ...serializeError(err) })
      return false
    }

    const record = athleteRecordSchema.safeParse(parsed)
    if (!record.success) {
      logger.warn('timeline_entry_rejected', {
        reason: 'validation',
        fields: record.error.flatten().fieldErrors,
      })
      return false
    }

    processor.process(toPerformanceEvent(record.data, newId(), now()))
    return true
  }

  return {
    async run(): Promise<void> {
      running = true
      logger.info('timeline_poller_started', { timeoutSeconds })
      while (running) {
        let raw: string | null
        try {
          raw = await timeline.pop(timeoutSeconds)
        } catch (err) {
          logger.error('timeline_pop_failed', serializeError(err))
          await sleep(retryDelayMs)
          continue
        }
        if (raw !== null) ingest(raw)
      }
      logger.info('timeline_poller_stopped')
    },

    stop(): void {
      running = false
    },

    ingest,
  }
}
