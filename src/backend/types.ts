export interface Coordinates {
  latitude: number
  longitude: number
  altitude: number
}

export interface Vec3 {
  x: number
  y: number
  z: number
}

/**
 * Ground station in radians and metres. Built once through `createObserver`
 * and frozen afterwards.
 */
export interface Observer {
  readonly latitude: number
  readonly longitude: number
  readonly altitude: number
  readonly minElevation: number
}

/** Inertial (ECI) position in metres and velocity in m/s at one instant. */
export interface StateVector {
  readonly position: Readonly<Vec3>
  readonly velocity: Readonly<Vec3>
}

export type PropagateFn<TElements> = (elements: TElements, time: Date) => StateVector

/**
 * Capability handed to the engine in place of a concrete propagator. The
 * engine only ever asks for one state vector per instant.
 */
export interface OrbitSource<TElements = unknown> {
  readonly name: string
  readonly elements: TElements
  propagate(elements: TElements, time: Date): StateVector
}

export interface TwoLineElement {
  name: string
  line1: string
  line2: string
}

export interface TopocentricFix {
  /** Radians from north, clockwise, in [0, 2π). */
  azimuth: number
  elevation: number
  /** Slant range in metres. */
  range: number
  /** Unit vector from observer to satellite in the inertial frame. */
  lineOfSight: Vec3
  timestamp: Date
  /** Satellite within numerical reach of the zenith; azimuth is arbitrary. */
  zenith: boolean
}

/** One leg of the link: what leaves the transmitter and what reaches the receiver. */
export interface FrequencyPair {
  transmitted: number
  received: number
  shift: number
}

export interface Observation extends TopocentricFix {
  /** m/s, positive while the satellite recedes. */
  rangeRate: number
  downlink: FrequencyPair
  uplink?: FrequencyPair
}

export interface TimeSpan {
  start: Date
  end: Date
}

export interface Pass {
  aos: Date
  los: Date
  maxElevation: number
  maxElevationTime: Date
  duration: number
  aosTruncated: boolean
  losTruncated: boolean
}

export interface SatellitePass extends Pass {
  satellite: string
}

export type NoPassReason = 'no-pass' | 'propagation-failed'

export type PassSearchResult =
  | { found: true; pass: Pass }
  | { found: false; reason: NoPassReason }

export type RangeRateMethod = 'forward' | 'central' | 'analytic'

export type HorizonPolicy = 'stop' | 'include'

export type TrackingStopReason = 'completed' | 'set' | 'propagation-failed'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface TrackerConfig {
  station: Coordinates
  minElevation: number
  radio: {
    downlinkHz: number
    uplinkHz?: number
  }
  tracking: {
    cadenceSeconds: number
    rangeRateStepSeconds: number
    rangeRateMethod: RangeRateMethod
  }
  prediction: {
    coarseStepSeconds: number
    hoursAhead: number
  }
  tle: {
    path: string
  }
  export: {
    dir: string
  }
  logLevel: LogLevel
}
