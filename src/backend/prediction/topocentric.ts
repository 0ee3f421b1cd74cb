import type { Observer, OrbitSource, StateVector, TopocentricFix, Vec3 } from '@backend/types'
import * as satellite from 'satellite.js'
import { dot, norm, scale, subtract } from '../utils/vector'
import { stateAt } from './orbit'

const METERS_PER_KM = 1000
const TWO_PI = 2 * Math.PI

// Above this elevation the azimuth swings too fast to be useful
export const ZENITH_ELEVATION = (89.9 * Math.PI) / 180

export interface HorizonBasis {
  east: Vec3
  north: Vec3
  up: Vec3
}

const wrapAzimuth = (angle: number): number => {
  const wrapped = angle < 0 ? angle + TWO_PI : angle
  return wrapped >= TWO_PI ? 0 : wrapped
}

/** Observer position in the inertial frame at `time`, in metres. */
export function observerPosition(observer: Observer, time: Date): Vec3 {
  const ecf = satellite.geodeticToEcf({
    latitude: observer.latitude,
    longitude: observer.longitude,
    height: observer.altitude / METERS_PER_KM,
  })
  const eci = satellite.ecfToEci(ecf, satellite.gstime(time))

  return scale(eci, METERS_PER_KM)
}

/**
 * Local east-north-up axes expressed in the inertial frame. The Earth's
 * rotation enters through the local sidereal angle (GMST + longitude).
 */
export function horizonBasis(observer: Observer, time: Date): HorizonBasis {
  const theta = satellite.gstime(time) + observer.longitude
  const sinLat = Math.sin(observer.latitude)
  const cosLat = Math.cos(observer.latitude)
  const sinTheta = Math.sin(theta)
  const cosTheta = Math.cos(theta)

  return {
    east: { x: -sinTheta, y: cosTheta, z: 0 },
    north: { x: -sinLat * cosTheta, y: -sinLat * sinTheta, z: cosLat },
    up: { x: cosLat * cosTheta, y: cosLat * sinTheta, z: sinLat },
  }
}

export function toTopocentric(observer: Observer, state: StateVector, time: Date): TopocentricFix {
  const lineOfSight = subtract(state.position, observerPosition(observer, time))
  const range = norm(lineOfSight)
  const basis = horizonBasis(observer, time)

  const east = dot(lineOfSight, basis.east)
  const north = dot(lineOfSight, basis.north)
  const up = dot(lineOfSight, basis.up)
  const horizontal = Math.hypot(east, north)
  const elevation = Math.atan2(up, horizontal)
  const zenith = elevation >= ZENITH_ELEVATION

  return {
    azimuth: zenith ? 0 : wrapAzimuth(Math.atan2(east, north)),
    elevation,
    range,
    lineOfSight: range > 0 ? scale(lineOfSight, 1 / range) : basis.up,
    timestamp: new Date(time),
    zenith,
  }
}

/** Propagate and transform in one step. Propagation errors reach the caller. */
export const observe = <E>(
  observer: Observer,
  source: OrbitSource<E>,
  time: Date
): TopocentricFix => toTopocentric(observer, stateAt(source, time), time)
