import { describe, it, expect, vi } from 'vitest'
import { UnknownStateError } from '@athlete-pulse/markov-core'
import type { FeedEvent } from '@athlete-pulse/types'
import { athleteEvent, createHarness, T0, TEST_CONFIG } from './helpers.js'

describe('EventProcessor', () => {
  it('runs every component in order', () => {
    const { processor } = createHarness()
    const result = processor.process(athleteEvent())

    expect(result.athleteId).toBe('a1')
    expect(result.applied).toEqual([
      'bloom_filter',
      'hyperloglog',
      'count_min_sketch',
      'minwise_sampling',
      'running_moments',
      'ams_f2',
      'dgim',
      'markov_chain',
      'monte_carlo',
      'knn_similarity',
    ])
    expect(processor.processed).toBe(1)
  })

  it('flags a play type only the first time it is seen', () => {
    const { processor, lines } = createHarness()

    expect(processor.process(athleteEvent()).firstSeenPlay).toBe(true)
    expect(processor.process(athleteEvent({ athleteId: 'a2' })).firstSeenPlay).toBe(false)
    expect(processor.process(athleteEvent({ playType: 'defensive' })).firstSeenPlay).toBe(true)

    const firstSeen = lines.filter((l) => l['event'] === 'play_type_first_seen')
    expect(firstSeen.map((l) => l['playKey'])).toEqual(['football:offensive', 'football:defensive'])
    expect(processor.streamingStats().playTypesSeen).toBe(2)
  })

  it('counts events per athlete', () => {
    const { processor } = createHarness()
    expect(processor.process(athleteEvent()).frequency).toBe(1)
    expect(processor.process(athleteEvent()).frequency).toBe(2)
  })

  it('publishes an athlete_processed feed event', () => {
    const { processor, feed } = createHarness()
    const listener = vi.fn<(event: FeedEvent) => void>()
    feed.subscribe(listener)

    processor.process(athleteEvent({ state: 'good', peak: true }))

    expect(listener).toHaveBeenCalledTimes(1)
    expect(listener).toHaveBeenCalledWith({
      type: 'athlete_processed',
      ts: new Date(T0).toISOString(),
      payload: { athleteId: 'a1', player: 'Ada', sport: 'football', state: 'good', peak: true },
    })
  })

  it('predicts the next state only for a configured current state', () => {
    const { processor } = createHarness()

    expect(processor.process(athleteEvent()).predictions.nextState).toBeNull()

    // Row "good" has no observations yet, so it is uniform over five states.
    const result = processor.process(
      athleteEvent({ state: 'good', transition: { from: 'peak', to: 'good' } }),
    )
    expect(result.predictions.nextState?.['good']).toBeCloseTo(0.2, 12)
    expect(processor.predictState('peak', 1)['good']).toBeCloseTo(1.001 / 1.005, 12)
    expect(processor.analyticsSummary().markov.totalObservations).toBe(1)
  })

  it('ignores transitions with labels outside the state set', () => {
    const { processor } = createHarness()
    processor.process(athleteEvent({ transition: { from: 'resting', to: 'good' } }))
    expect(processor.analyticsSummary().markov.totalObservations).toBe(0)
  })

  it('throws UnknownStateError for an unknown prediction state', () => {
    const { processor } = createHarness()
    expect(() => processor.predictState('resting', 1)).toThrow(UnknownStateError)
  })

  it('gives a reproducible success probability for a fixed seed', () => {
    const a = createHarness().processor.process(athleteEvent())
    const b = createHarness().processor.process(athleteEvent())

    expect(a.predictions.successProbability).toBe(b.predictions.successProbability)
    expect(a.predictions.successProbability).toBeGreaterThanOrEqual(0)
    expect(a.predictions.successProbability).toBeLessThanOrEqual(1)
  })

  it('counts peaks in the trailing window by arrival time', () => {
    const { processor, clock } = createHarness()

    processor.process(athleteEvent({ peak: true }))
    clock.now += 1000
    processor.process(athleteEvent({ peak: true }))
    processor.process(athleteEvent({ peak: false }))

    const stats = processor.streamingStats()
    expect(stats.windowPeaks).toBe(2)
    expect(stats.sampleSize).toBe(1)

    clock.now += 120_000
    expect(processor.streamingStats().windowPeaks).toBe(0)
  })

  it('keeps running moments per athlete', () => {
    const { processor } = createHarness()
    processor.process(athleteEvent({ speed: 10 }))
    processor.process(athleteEvent({ speed: 14 }))

    const moments = processor.athleteMoments('a1')
    expect(moments?.speed.count).toBe(2)
    expect(moments?.speed.mean).toBe(12)
    expect(moments?.speed.variance).toBe(8)
    expect(moments?.accuracy.mean).toBe(80)
    expect(processor.athleteMoments('nobody')).toBeNull()
  })

  describe('similarity', () => {
    const speeds: [string, number][] = [
      ['a', 10],
      ['b', 11],
      ['c', 20],
      ['d', 30],
    ]

    it('leaves results empty until five athletes are known', () => {
      const { processor } = createHarness()
      for (const [id, speed] of speeds) {
        expect(processor.process(athleteEvent({ athleteId: id, speed })).similar).toEqual([])
      }
    })

    it('reports the three nearest other athletes', () => {
      const { processor } = createHarness()
      for (const [id, speed] of speeds) processor.process(athleteEvent({ athleteId: id, speed }))

      const result = processor.process(athleteEvent({ athleteId: 'e', speed: 40 }))
      expect(result.similar.map((m) => m.id)).toEqual(['d', 'c', 'b'])
      expect(result.similar.map((m) => m.rank)).toEqual([1, 2, 3])

      expect(processor.similarTo('a', 2)?.map((m) => m.id)).toEqual(['b', 'c'])
    })

    it('draws the three from the configured neighbour count', () => {
      const { processor } = createHarness({ ...TEST_CONFIG, knnNeighbors: 2 })
      for (const [id, speed] of speeds) processor.process(athleteEvent({ athleteId: id, speed }))

      const result = processor.process(athleteEvent({ athleteId: 'e', speed: 40 }))
      expect(result.similar.map((m) => m.id)).toEqual(['d', 'c'])
      expect(processor.neighborCount).toBe(2)
    })

    it('returns null for an unknown athlete', () => {
      const { processor } = createHarness()
      processor.process(athleteEvent())
      expect(processor.similarTo('nobody', 3)).toBeNull()
    })
  })

  it('summarizes the heaviest athletes with their moments', () => {
    const { processor } = createHarness()
    for (const [id, times] of [
      ['a1', 3],
      ['a2', 2],
      ['a3', 1],
    ] as const) {
      for (let i = 0; i < times; i++) processor.process(athleteEvent({ athleteId: id }))
    }

    const summary = processor.analyticsSummary()
    expect(summary.processed).toBe(6)
    expect(summary.generatedAt).toBe(new Date(T0).toISOString())
    expect(summary.topAthletes).toEqual([
      { key: 'a1', estimate: 3, player: 'Ada' },
      { key: 'a2', estimate: 2, player: 'Ada' },
      { key: 'a3', estimate: 1, player: 'Ada' },
    ])
    expect(summary.athletes.map((a) => [a.athleteId, a.events])).toEqual([
      ['a1', 3],
      ['a2', 2],
      ['a3', 1],
    ])
    expect(summary.streaming.trackedAthletes).toBe(3)
    expect(summary.markov.states).toEqual(['peak', 'good', 'average', 'declining', 'injured'])
  })

  it('builds a snapshot event from the current stats', () => {
    const { processor } = createHarness()
    processor.process(athleteEvent({ peak: true }))

    expect(processor.snapshotEvent()).toEqual({
      type: 'snapshot',
      ts: new Date(T0).toISOString(),
      payload: {
        processed: 1,
        distinctPlays: processor.streamingStats().distinctPlays,
        windowPeaks: 1,
      },
    })
  })
})
