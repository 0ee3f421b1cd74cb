import { T0, TEST_STATION, createScriptedSource, secondsAfter } from '@/test-fixtures'
import { createObserver, toRadians } from '@backend/prediction/orbit'
import { formatPass, formatPassesTable, predictPasses } from '@backend/prediction/passes'
import type { SatellitePass } from '@backend/types'
import { logger } from '@backend/utils/logger'
import { describe, expect, it } from 'vitest'

const observer = createObserver(TEST_STATION, 10)

// One pass culminating `centre` seconds after T0
const passAround = (name: string, centre: number) =>
  createScriptedSource(
    observer,
    (time) => {
      const seconds = (time.getTime() - T0.getTime()) / 1000
      return {
        azimuth: toRadians(45),
        elevation: toRadians(Math.max(-80, 80 - 90 * ((seconds - centre) / 300) ** 2)),
        range: 1_200_000,
      }
    },
    name
  )

const createPass = (overrides: Partial<SatellitePass> = {}): SatellitePass => ({
  satellite: 'NOAA 19',
  aos: new Date('2025-03-27T10:30:00Z'),
  los: new Date('2025-03-27T10:45:00Z'),
  maxElevation: toRadians(65.5),
  maxElevationTime: new Date('2025-03-27T10:37:30Z'),
  duration: 900,
  aosTruncated: false,
  losTruncated: false,
  ...overrides,
})

describe('pass prediction', () => {
  describe('predictPasses', () => {
    it('should merge passes of every source sorted by AOS', () => {
      const passes = predictPasses([passAround('LATE', 2400), passAround('EARLY', 900)], observer, {
        startTime: T0,
        hoursAhead: 1,
      })

      expect(passes.map((p) => p.satellite)).toEqual(['EARLY', 'LATE'])
      expect((passes[0]?.aos.getTime() ?? 0) - T0.getTime()).toBeCloseTo(635_425, -1)
      expect((passes[1]?.aos.getTime() ?? 0) - T0.getTime()).toBeCloseTo(2_135_425, -1)
    })

    it('should log sources without passes', () => {
      const passes = predictPasses([passAround('FAR', 10_000)], observer, {
        startTime: T0,
        hoursAhead: 1,
      })

      expect(passes).toEqual([])
      expect(logger.satellite).toHaveBeenCalledWith('FAR', 'No passes in the next 1 hours')
    })

    it('should honour the search window end', () => {
      const passes = predictPasses([passAround('EARLY', 900)], observer, {
        startTime: secondsAfter(T0, 1800),
        hoursAhead: 1,
      })

      expect(passes).toHaveLength(0)
    })
  })

  describe('formatPass', () => {
    it('should format pass information in UTC', () => {
      expect(formatPass(createPass())).toBe(
        'NOAA 19: 2025-03-27 10:30:00 → 10:45:00 UTC (15min, max 65.5°)'
      )
    })

    it('should mark truncated passes', () => {
      expect(formatPass(createPass({ losTruncated: true }))).toBe(
        'NOAA 19: 2025-03-27 10:30:00 → 10:45:00 UTC (15min, max 65.5°) [partial]'
      )
    })
  })

  describe('formatPassesTable', () => {
    it.each([
      ['2025-03-27T10:00:00Z', 'Pending'],
      ['2025-03-27T10:40:00Z', 'Active'],
      ['2025-03-27T11:00:00Z', 'Passed'],
    ])('should show the pass status at %s', (now, status) => {
      const lines = formatPassesTable([createPass()], new Date(now)).split('\n')

      expect(lines).toHaveLength(5)
      expect(lines[3]).toBe(
        `│ NOAA 19     │ 2025-03-27 10:30:00 │ 15min    │ 65.5°     │ ${status.padEnd(8)} │`
      )
    })
  })
})
