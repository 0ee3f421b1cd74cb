import { ElementSetError, PropagationError, type PropagationErrorCode } from '@backend/errors'
import type {
  Coordinates,
  Observer,
  OrbitSource,
  PropagateFn,
  StateVector,
  TwoLineElement,
  Vec3,
} from '@backend/types'
import * as satellite from 'satellite.js'

export const DEG_TO_RAD = Math.PI / 180
export const RAD_TO_DEG = 180 / Math.PI

const METERS_PER_KM = 1000

export const toRadians = (degrees: number): number => degrees * DEG_TO_RAD
export const toDegrees = (radians: number): number => radians * RAD_TO_DEG

export function createObserver(coords: Coordinates, minElevationDeg = 0): Observer {
  return Object.freeze({
    latitude: toRadians(coords.latitude),
    longitude: toRadians(coords.longitude),
    altitude: coords.altitude,
    minElevation: toRadians(minElevationDeg),
  })
}

// satrec.error values set by SGP4 when a propagation goes wrong
const SGP4_ERROR_CODES: Record<number, PropagationErrorCode> = {
  1: 'degenerate',
  2: 'element-set',
  3: 'degenerate',
  4: 'degenerate',
  6: 'decayed',
}

const kmToMeters = (v: satellite.EciVec3<number>): Vec3 => ({
  x: v.x * METERS_PER_KM,
  y: v.y * METERS_PER_KM,
  z: v.z * METERS_PER_KM,
})

export function parseElements(tle: TwoLineElement): satellite.SatRec {
  if (!tle.line1.trim().startsWith('1 ') || !tle.line2.trim().startsWith('2 ')) {
    throw new ElementSetError(`Malformed TLE lines for ${tle.name}`)
  }

  const satrec = satellite.twoline2satrec(tle.line1.trim(), tle.line2.trim())

  if (satrec.error !== 0) {
    throw new ElementSetError(`Invalid element set for ${tle.name} (SGP4 error ${satrec.error})`)
  }

  return satrec
}

export const propagateSgp4: PropagateFn<satellite.SatRec> = (satrec, time) => {
  let result: ReturnType<typeof satellite.propagate>
  try {
    result = satellite.propagate(satrec, time)
  } catch (error) {
    throw new PropagationError(`SGP4 failed at ${time.toISOString()}`, time, 'unknown', {
      cause: error,
    })
  }

  const { position, velocity } = result
  if (typeof position === 'boolean' || typeof velocity === 'boolean') {
    const code = SGP4_ERROR_CODES[satrec.error] ?? 'unknown'
    throw new PropagationError(
      `No state vector at ${time.toISOString()} (SGP4 error ${satrec.error})`,
      time,
      code
    )
  }

  return { position: kmToMeters(position), velocity: kmToMeters(velocity) }
}

export function createSgp4Source(tle: TwoLineElement): OrbitSource<satellite.SatRec> {
  return {
    name: tle.name,
    elements: parseElements(tle),
    propagate: propagateSgp4,
  }
}

export const stateAt = <E>(source: OrbitSource<E>, time: Date): StateVector =>
  source.propagate(source.elements, time)
