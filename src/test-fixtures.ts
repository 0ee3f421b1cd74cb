import { PropagationError } from '@backend/errors'
import { EARTH_ROTATION_RATE } from '@backend/prediction/range-rate'
import { horizonBasis, observerPosition } from '@backend/prediction/topocentric'
import type {
  Coordinates,
  FrequencyPair,
  Observation,
  Observer,
  OrbitSource,
  StateVector,
  TwoLineElement,
  Vec3,
} from '@backend/types'
import { add, scale } from '@backend/utils/vector'

export const TEST_STATION: Coordinates = {
  latitude: -34.6037,
  longitude: -58.3816,
  altitude: 25,
}

export const TEST_TLE: TwoLineElement = {
  name: 'NOAA 19',
  line1: '1 33591U 09005A   25085.56541919  .00000082  00000+0  69653-4 0  9990',
  line2: '2 33591  99.1870 136.4258 0014198 103.3588 256.9118 14.12499278770708',
}

export const T0 = new Date('2025-03-27T12:00:00Z')

export const secondsAfter = (base: Date, seconds: number): Date =>
  new Date(base.getTime() + seconds * 1000)

export interface LookDirection {
  azimuth: number
  elevation: number
  range: number
}

export interface ScriptedElements {
  observer: Observer
  look: (time: Date) => LookDirection
}

const zeroVelocity: Vec3 = { x: 0, y: 0, z: 0 }

/**
 * Places the satellite wherever `look` says it is as seen from `observer`, so
 * tests control the elevation profile directly.
 */
export function createScriptedSource(
  observer: Observer,
  look: (time: Date) => LookDirection,
  name = 'SCRIPTED'
): OrbitSource<ScriptedElements> {
  return {
    name,
    elements: { observer, look },
    propagate: ({ observer, look }, time): StateVector => {
      const { azimuth, elevation, range } = look(time)
      const { east, north, up } = horizonBasis(observer, time)
      const horizontal = Math.cos(elevation)
      const toEast = scale(east, horizontal * Math.sin(azimuth))
      const toNorth = scale(north, horizontal * Math.cos(azimuth))
      const direction = add(add(toEast, toNorth), scale(up, Math.sin(elevation)))

      return {
        position: add(observerPosition(observer, time), scale(direction, range)),
        velocity: zeroVelocity,
      }
    },
  }
}

export interface ZenithElements {
  observer: Observer
  altitude: number
  climbRate: number
  epoch: Date
}

/**
 * Satellite held straight above the observer, rotating with the Earth, with
 * its height changing at `climbRate` m/s from `epoch`.
 */
export function createZenithSource(
  observer: Observer,
  altitude: number,
  climbRate = 0,
  epoch = T0
): OrbitSource<ZenithElements> {
  return {
    name: 'ZENITH',
    elements: { observer, altitude, climbRate, epoch },
    propagate: ({ observer, altitude, climbRate, epoch }, time): StateVector => {
      const { up } = horizonBasis(observer, time)
      const height = altitude + (climbRate * (time.getTime() - epoch.getTime())) / 1000
      const position = add(observerPosition(observer, time), scale(up, height))
      const corotation = {
        x: -EARTH_ROTATION_RATE * position.y,
        y: EARTH_ROTATION_RATE * position.x,
        z: 0,
      }

      return { position, velocity: add(corotation, scale(up, climbRate)) }
    },
  }
}

/** Wraps `source` so that instants matching `fails` have no state vector. */
export function withFailures<E>(
  source: OrbitSource<E>,
  fails: (time: Date) => boolean
): OrbitSource<E> {
  return {
    ...source,
    propagate: (elements, time) => {
      if (fails(time)) {
        const message = `Element set too stale for ${time.toISOString()}`
        throw new PropagationError(message, time, 'element-set')
      }
      return source.propagate(elements, time)
    },
  }
}

export function createTestObservation(overrides: Partial<Observation> = {}): Observation {
  const downlink: FrequencyPair = {
    transmitted: 145_800_000,
    received: 145_800_729.5,
    shift: 729.5,
  }

  return {
    azimuth: Math.PI / 2,
    elevation: Math.PI / 4,
    range: 1_234_567,
    lineOfSight: { x: 0, y: 0, z: 1 },
    timestamp: new Date('2024-01-01T12:00:00Z'),
    zenith: false,
    rangeRate: -1500.25,
    downlink,
    ...overrides,
  }
}
