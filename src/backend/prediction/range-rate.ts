import type { Observer, OrbitSource, RangeRateMethod, TopocentricFix, Vec3 } from '@backend/types'
import { dot, subtract } from '../utils/vector'
import { stateAt } from './orbit'
import { observe, observerPosition, toTopocentric } from './topocentric'

export const DEFAULT_RANGE_RATE_STEP_SECONDS = 10

// rad/s, sidereal
export const EARTH_ROTATION_RATE = 7.2921150e-5

export interface RangeRateOptions {
  stepSeconds?: number
  method?: RangeRateMethod
}

export interface RangeRateEstimate {
  fix: TopocentricFix
  rangeRate: number
}

const offset = (time: Date, seconds: number): Date => new Date(time.getTime() + seconds * 1000)

const observerVelocity = (position: Vec3): Vec3 => ({
  x: -EARTH_ROTATION_RATE * position.y,
  y: EARTH_ROTATION_RATE * position.x,
  z: 0,
})

/**
 * Range-rate at `time`. The default forward difference asks the source for
 * two fresh state vectors, at t and t + Δ, and divides the range change by Δ.
 */
export function estimateRangeRate<E>(
  observer: Observer,
  source: OrbitSource<E>,
  time: Date,
  options: RangeRateOptions = {}
): RangeRateEstimate {
  const { stepSeconds = DEFAULT_RANGE_RATE_STEP_SECONDS, method = 'forward' } = options

  if (!(stepSeconds > 0) || !Number.isFinite(stepSeconds)) {
    throw new RangeError(`Range-rate step must be a positive number of seconds, got ${stepSeconds}`)
  }

  const state = stateAt(source, time)
  const fix = toTopocentric(observer, state, time)

  switch (method) {
    case 'forward': {
      const after = observe(observer, source, offset(time, stepSeconds))
      return { fix, rangeRate: (after.range - fix.range) / stepSeconds }
    }
    case 'central': {
      const before = observe(observer, source, offset(time, -stepSeconds))
      const after = observe(observer, source, offset(time, stepSeconds))
      return { fix, rangeRate: (after.range - before.range) / (2 * stepSeconds) }
    }
    case 'analytic': {
      const position = observerPosition(observer, time)
      const relative = subtract(state.velocity, observerVelocity(position))
      return { fix, rangeRate: dot(relative, fix.lineOfSight) }
    }
  }
}
