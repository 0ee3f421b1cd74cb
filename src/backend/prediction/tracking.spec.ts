import {
  T0,
  TEST_STATION,
  createScriptedSource,
  createZenithSource,
  secondsAfter,
  withFailures,
} from '@/test-fixtures'
import { PropagationError } from '@backend/errors'
import { createObserver, toRadians } from '@backend/prediction/orbit'
import { collectTrack, observeTick, trackPass } from '@backend/prediction/tracking'
import type { Pass } from '@backend/types'
import { logger } from '@backend/utils/logger'
import { describe, expect, it, vi } from 'vitest'

const observer = createObserver(TEST_STATION, 10)
const radio = { downlinkHz: 435.85e6 }

const elevationProfile = (seconds: number): number =>
  Math.max(-80, 80 - 90 * ((seconds - 900) / 300) ** 2)

const scripted = createScriptedSource(observer, (time) => ({
  azimuth: toRadians(200),
  elevation: toRadians(elevationProfile((time.getTime() - T0.getTime()) / 1000)),
  range: 1_500_000,
}))

const span = (fromSeconds: number, toSeconds: number) => ({
  start: secondsAfter(T0, fromSeconds),
  end: secondsAfter(T0, toSeconds),
})

describe('tracking', () => {
  describe('observeTick', () => {
    it('should correct the downlink for the current range-rate', () => {
      const source = createZenithSource(observer, 400_000, 7_000)
      const observation = observeTick(observer, source, T0, radio)

      expect(observation.rangeRate).toBeCloseTo(7_000, 4)
      expect(observation.downlink.transmitted).toBe(435.85e6)
      expect(observation.downlink.shift).toBeCloseTo(-10176.87376244802, 4)
      expect(observation.uplink).toBeUndefined()
    })

    it('should leave the downlink untouched for a satellite fixed overhead', () => {
      const source = createZenithSource(observer, 400_000)
      const observation = observeTick(observer, source, T0, { downlinkHz: 145.8e6 })

      expect(observation.downlink.shift).toBeCloseTo(0, 6)
      expect(observation.downlink.received).toBeCloseTo(145.8e6, 6)
    })

    it('should add an uplink pair when an uplink frequency is configured', () => {
      const source = createZenithSource(observer, 400_000, -2_000)
      const observation = observeTick(observer, source, T0, { ...radio, uplinkHz: 145.9e6 })

      expect(observation.uplink?.received).toBe(145.9e6)
      expect(observation.uplink?.shift).toBeGreaterThan(0)
    })
  })

  describe('trackPass', () => {
    it('should tick across the half-open span', () => {
      const source = createZenithSource(observer, 400_000)
      const { observations, summary } = collectTrack(observer, source, span(0, 5), radio)

      expect(observations.map((o) => o.timestamp.getTime() - T0.getTime())).toEqual([
        0, 1000, 2000, 3000, 4000,
      ])
      expect(summary).toEqual({ emitted: 5, skipped: 0, belowHorizon: 0, stopReason: 'completed' })
    })

    it('should honour the cadence', () => {
      const source = createZenithSource(observer, 400_000)
      const { observations } = collectTrack(observer, source, span(0, 5), {
        ...radio,
        cadenceSeconds: 2,
      })

      expect(observations.map((o) => o.timestamp.getTime() - T0.getTime())).toEqual([0, 2000, 4000])
    })

    it('should track from AOS to LOS when given a pass', () => {
      const pass: Pass = {
        aos: secondsAfter(T0, 10),
        los: secondsAfter(T0, 13),
        maxElevation: Math.PI / 2,
        maxElevationTime: secondsAfter(T0, 11),
        duration: 3,
        aosTruncated: false,
        losTruncated: false,
      }

      const source = createZenithSource(observer, 400_000)
      const { observations } = collectTrack(observer, source, pass, radio)

      expect(observations.map((o) => o.timestamp)).toEqual([
        secondsAfter(T0, 10),
        secondsAfter(T0, 11),
        secondsAfter(T0, 12),
      ])
    })

    it('should skip ticks before rise and stop when the satellite sets', () => {
      const { observations, summary } = collectTrack(observer, scripted, span(600, 1800), radio)

      expect(summary).toEqual({ emitted: 529, skipped: 0, belowHorizon: 36, stopReason: 'set' })
      expect(observations[0]?.timestamp).toEqual(secondsAfter(T0, 636))
      expect(observations.at(-1)?.timestamp).toEqual(secondsAfter(T0, 1164))
    })

    it('should count pre-rise ticks apart from failed ones', () => {
      const { observations, summary } = collectTrack(observer, scripted, span(600, 700), radio)

      expect(summary).toEqual({
        emitted: 64,
        skipped: 0,
        belowHorizon: 36,
        stopReason: 'completed',
      })
      expect(observations[0]?.timestamp).toEqual(secondsAfter(T0, 636))
    })

    it('should keep below-horizon ticks with the include policy', () => {
      const { observations, summary } = collectTrack(observer, scripted, span(0, 600), {
        ...radio,
        horizon: 'include',
      })

      expect(observations).toHaveLength(600)
      const times = observations.map((o) => o.timestamp.getTime())
      expect(times.every((time, i) => i === 0 || time > (times[i - 1] ?? time))).toBe(true)
      expect(summary.stopReason).toBe('completed')
      expect(observations[0]?.elevation).toBeCloseTo(toRadians(-80), 9)
    })

    it('should drop failed ticks and carry on', () => {
      const failing = (time: Date) => {
        const seconds = (time.getTime() - T0.getTime()) / 1000
        return seconds >= 100 && seconds < 103
      }
      const source = withFailures(createZenithSource(observer, 400_000), failing)

      const { observations, summary } = collectTrack(observer, source, span(0, 200), radio)

      // forward differences at 90..92 s need the failing states too
      expect(summary.emitted).toBe(194)
      expect(summary.skipped).toBe(6)
      expect(summary.belowHorizon).toBe(0)
      expect(summary.stopReason).toBe('completed')
      expect(summary.lastError).toBeInstanceOf(PropagationError)
      const seconds = observations.map((o) => (o.timestamp.getTime() - T0.getTime()) / 1000)
      expect(seconds).not.toContain(100)
    })

    it('should give up after too many consecutive failures', () => {
      const cutoff = secondsAfter(T0, 50)
      const source = withFailures(createZenithSource(observer, 400_000), (time) => time >= cutoff)

      const { summary } = collectTrack(observer, source, span(0, 200), radio)

      expect(summary.emitted).toBe(40)
      expect(summary.skipped).toBe(11)
      expect(summary.stopReason).toBe('propagation-failed')
      expect(summary.lastError?.code).toBe('element-set')
      expect(logger.error).toHaveBeenCalledWith('Giving up on ZENITH after 11 failed ticks')
    })

    it('should warn once about zenith geometry per run', () => {
      collectTrack(observer, createZenithSource(observer, 400_000), span(0, 20), radio)

      const warnings = vi.mocked(logger.warn).mock.calls.filter(([message]) =>
        String(message).startsWith('DegenerateGeometryWarning')
      )
      expect(warnings).toHaveLength(1)
    })

    it('should reject a non-positive cadence', () => {
      const source = createZenithSource(observer, 400_000)

      expect(() =>
        collectTrack(observer, source, span(0, 10), { ...radio, cadenceSeconds: 0 })
      ).toThrow(RangeError)
    })

    it('should produce ticks lazily', () => {
      const zenith = createZenithSource(observer, 400_000)
      const propagate = vi.fn(zenith.propagate)
      const run = trackPass(observer, { ...zenith, propagate }, span(0, 3600), radio)

      expect(propagate).not.toHaveBeenCalled()
      run.next()
      run.next()
      run.return({ emitted: 2, skipped: 0, belowHorizon: 0, stopReason: 'completed' })

      expect(propagate).toHaveBeenCalledTimes(4)
    })

    it('should yield identical observations for identical inputs', () => {
      const first = collectTrack(observer, scripted, span(890, 900), radio)
      const second = collectTrack(observer, scripted, span(890, 900), radio)

      expect(first).toEqual(second)
    })
  })
})
