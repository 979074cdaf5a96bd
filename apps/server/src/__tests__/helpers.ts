import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '@athlete-pulse/shared'
import type { PerformanceEvent } from '@athlete-pulse/types'
import { createLogger, type LogLevel, type Logger } from '../lib/logger.js'
import { FeedHub } from '../pipeline/feed.js'
import { EventProcessor } from '../pipeline/processor.js'

export const T0 = Date.UTC(2026, 0, 5, 12, 0, 0)

export const TEST_CONFIG: EngineConfig = {
  ...DEFAULT_ENGINE_CONFIG,
  hllPrecision: 10,
  samplerSize: 10,
  windowSeconds: 60,
  simulationTrials: 200,
  seed: 7,
}

/** Logger that keeps parsed lines in memory. */
export function memoryLogger(level: LogLevel = 'debug'): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = []
  const logger = createLogger({
    level,
    write: (line) => {
      lines.push(JSON.parse(line))
    },
  })
  return { logger, lines }
}

export interface Harness {
  processor: EventProcessor
  feed: FeedHub
  logger: Logger
  lines: Record<string, unknown>[]
  clock: { now: number }
}

export function createHarness(config: EngineConfig = TEST_CONFIG): Harness {
  const { logger, lines } = memoryLogger()
  const feed = new FeedHub(logger)
  const clock = { now: T0 }
  const processor = new EventProcessor({ config, feed, logger, clock: () => clock.now })
  return { processor, feed, logger, lines, clock }
}

export function athleteEvent(overrides: Partial<PerformanceEvent> = {}): PerformanceEvent {
  return {
    athleteId: 'a1',
    player: 'Ada',
    sport: 'football',
    playType: 'offensive',
    speed: 10,
    accuracy: 80,
    stamina: 70,
    peak: false,
    timestamp: T0,
    ...overrides,
  }
}
