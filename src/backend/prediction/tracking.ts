import { PropagationError } from '@backend/errors'
import type {
  HorizonPolicy,
  Observation,
  Observer,
  OrbitSource,
  Pass,
  TimeSpan,
  TrackingStopReason,
} from '@backend/types'
import { logger } from '../utils/logger'
import { correctDownlink, correctUplink } from './doppler'
import { toDegrees, toRadians } from './orbit'
import { estimateRangeRate, type RangeRateOptions } from './range-rate'

export interface TickOptions {
  downlinkHz: number
  uplinkHz?: number
  rangeRate?: RangeRateOptions
}

export interface TrackingOptions extends TickOptions {
  cadenceSeconds?: number
  /** `stop` ends the run once the satellite sets; `include` keeps every tick. */
  horizon?: HorizonPolicy
  horizonToleranceDeg?: number
  maxConsecutiveFailures?: number
}

export interface TrackingSummary {
  emitted: number
  /** Ticks dropped because propagation failed. */
  skipped: number
  /** Ticks before the satellite rose, under the `stop` horizon policy. */
  belowHorizon: number
  stopReason: TrackingStopReason
  lastError?: PropagationError
}

export interface TrackResult {
  observations: Observation[]
  summary: TrackingSummary
}

export const DEFAULT_TRACKING = {
  cadenceSeconds: 1,
  horizon: 'stop',
  horizonToleranceDeg: 0.01,
  maxConsecutiveFailures: 10,
} as const

const isPass = (span: TimeSpan | Pass): span is Pass => 'aos' in span

/** One self-contained tick. Independent of every other tick. */
export function observeTick<E>(
  observer: Observer,
  source: OrbitSource<E>,
  time: Date,
  options: TickOptions
): Observation {
  const { fix, rangeRate } = estimateRangeRate(observer, source, time, options.rangeRate)
  const observation: Observation = {
    ...fix,
    rangeRate,
    downlink: correctDownlink(options.downlinkHz, rangeRate),
  }

  if (options.uplinkHz !== undefined) {
    observation.uplink = correctUplink(options.uplinkHz, rangeRate)
  }

  return observation
}

/**
 * Walks `span` forward at a fixed cadence, yielding one observation per tick
 * for `start <= t < end`. The generator's return value tells why it stopped.
 */
export function* trackPass<E>(
  observer: Observer,
  source: OrbitSource<E>,
  span: TimeSpan | Pass,
  options: TrackingOptions
): Generator<Observation, TrackingSummary, void> {
  const {
    cadenceSeconds = DEFAULT_TRACKING.cadenceSeconds,
    horizon = DEFAULT_TRACKING.horizon,
    horizonToleranceDeg = DEFAULT_TRACKING.horizonToleranceDeg,
    maxConsecutiveFailures = DEFAULT_TRACKING.maxConsecutiveFailures,
  } = options

  if (!(cadenceSeconds > 0) || !Number.isFinite(cadenceSeconds)) {
    throw new RangeError(
      `Sample cadence must be a positive number of seconds, got ${cadenceSeconds}`
    )
  }

  const { start, end } = isPass(span) ? { start: span.aos, end: span.los } : span
  const startMs = start.getTime()
  const endMs = end.getTime()
  const cadenceMs = cadenceSeconds * 1000
  const horizonLimit = observer.minElevation - toRadians(horizonToleranceDeg)

  let emitted = 0
  let skipped = 0
  let belowHorizon = 0
  let consecutiveFailures = 0
  let risen = false
  let zenithReported = false
  let lastError: PropagationError | undefined

  const summary = (stopReason: TrackingStopReason): TrackingSummary => ({
    emitted,
    skipped,
    belowHorizon,
    stopReason,
    ...(lastError && { lastError }),
  })

  logger.track(`Tracking ${source.name} from ${start.toISOString()} to ${end.toISOString()}`)

  for (let tick = 0; ; tick++) {
    const time = new Date(startMs + tick * cadenceMs)
    if (time.getTime() >= endMs) break

    let observation: Observation
    try {
      observation = observeTick(observer, source, time, options)
    } catch (error) {
      if (!(error instanceof PropagationError)) throw error

      lastError = error
      skipped++
      consecutiveFailures++
      logger.warn(`Dropped tick ${time.toISOString()} for ${source.name}: ${error.message}`)

      if (consecutiveFailures > maxConsecutiveFailures) {
        logger.error(`Giving up on ${source.name} after ${consecutiveFailures} failed ticks`)
        return summary('propagation-failed')
      }
      continue
    }

    consecutiveFailures = 0

    if (horizon === 'stop' && observation.elevation < horizonLimit) {
      if (risen) {
        const elevation = toDegrees(observation.elevation).toFixed(2)
        logger.track(`${source.name} set early at ${time.toISOString()} (${elevation}°)`)
        return summary('set')
      }
      belowHorizon++
      continue
    }

    risen = true

    if (observation.zenith && !zenithReported) {
      zenithReported = true
      const at = time.toISOString()
      logger.warn(`DegenerateGeometryWarning: ${source.name} at zenith, azimuth undefined at ${at}`)
    }

    emitted++
    yield observation
  }

  return summary('completed')
}

/** Drains `trackPass` into an array. */
export function collectTrack<E>(
  observer: Observer,
  source: OrbitSource<E>,
  span: TimeSpan | Pass,
  options: TrackingOptions
): TrackResult {
  const run = trackPass(observer, source, span, options)
  const observations: Observation[] = []

  for (;;) {
    const next = run.next()
    if (next.done) return { observations, summary: next.value }
    observations.push(next.value)
  }
}
