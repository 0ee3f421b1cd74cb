import { isPropagationError } from '@backend/errors'
import type { Observer, OrbitSource, Pass, PassSearchResult, TimeSpan } from '@backend/types'
import { logger } from '../utils/logger'
import { toDegrees, toRadians } from './orbit'
import { observe } from './topocentric'

export interface PassSearchOptions {
  /** Coarse scan step. Keep it below the shortest pass worth finding. */
  coarseStepSeconds?: number
  /** Sampling step between AOS and LOS when looking for the culmination. */
  fineStepSeconds?: number
  /** Allowed distance from the threshold at AOS and LOS, in degrees. */
  toleranceDeg?: number
}

export const DEFAULT_PASS_SEARCH = {
  coarseStepSeconds: 30,
  fineStepSeconds: 10,
  toleranceDeg: 0.001,
} as const

const MAX_BISECTIONS = 64

interface Sample {
  time: number
  elevation: number
}

type Evaluate = (time: number) => number | null

/** Elevation in radians, or `null` when the source has no state for `time`. */
export function elevationAt<E>(
  observer: Observer,
  source: OrbitSource<E>,
  time: Date
): number | null {
  try {
    return observe(observer, source, time).elevation
  } catch (error) {
    if (!isPropagationError(error)) throw error
    logger.debug(`Sample unavailable for ${source.name} at ${time.toISOString()}: ${error.message}`)
    return null
  }
}

// Bracket fractions tried when the midpoint has no state vector
const FALLBACK_FRACTIONS = [0.25, 0.75, 0.125, 0.375, 0.625, 0.875]

const interiorSample = (evaluate: Evaluate, lo: Sample, hi: Sample): Sample | null => {
  for (const fraction of [0.5, ...FALLBACK_FRACTIONS]) {
    const time = Math.round(lo.time + (hi.time - lo.time) * fraction)
    if (time <= lo.time || time >= hi.time) continue

    const elevation = evaluate(time)
    if (elevation !== null) return { time, elevation }
  }
  return null
}

const refineCrossing = (
  evaluate: Evaluate,
  from: Sample,
  to: Sample,
  threshold: number,
  tolerance: number
): number => {
  let lo = from
  let hi = to
  const loAbove = from.elevation > threshold

  for (let i = 0; i < MAX_BISECTIONS && hi.time - lo.time > 1; i++) {
    const sample = interiorSample(evaluate, lo, hi)
    if (!sample) break
    if (Math.abs(sample.elevation - threshold) <= tolerance) return sample.time

    if (sample.elevation > threshold === loAbove) lo = sample
    else hi = sample
  }

  const loError = Math.abs(lo.elevation - threshold)
  return loError <= Math.abs(hi.elevation - threshold) ? lo.time : hi.time
}

// Vertex of the parabola through three samples
const parabolicVertex = (a: Sample, b: Sample, c: Sample): number | null => {
  const ab = b.time - a.time
  const cb = b.time - c.time
  const denominator = ab * (b.elevation - c.elevation) - cb * (b.elevation - a.elevation)
  if (denominator === 0) return null

  const numerator = ab * ab * (b.elevation - c.elevation) - cb * cb * (b.elevation - a.elevation)
  return b.time - numerator / denominator / 2
}

interface PassEdges {
  aos: number
  los: number
  aosTruncated: boolean
  losTruncated: boolean
}

/**
 * A window edge that cuts the pass can be its highest point. The culmination
 * is then moved one millisecond inside so that AOS < max < LOS holds.
 */
const insideEdge = (evaluate: Evaluate, edge: Sample, time: number): Sample => ({
  time,
  elevation: evaluate(time) ?? edge.elevation,
})

const findCulmination = (evaluate: Evaluate, edges: PassEdges, stepMs: number): Sample | null => {
  const { aos, los, aosTruncated, losTruncated } = edges
  const samples: Sample[] = []
  const times = [aos]
  for (let t = aos + stepMs; t < los; t += stepMs) times.push(t)
  if (times.length === 1) times.push(Math.round((aos + los) / 2))
  times.push(los)

  for (const time of times) {
    const elevation = evaluate(time)
    if (elevation !== null) samples.push({ time, elevation })
  }

  const candidate = (sample: Sample): boolean =>
    (sample.time > aos && sample.time < los) ||
    (aosTruncated && sample.time === aos) ||
    (losTruncated && sample.time === los)

  let bestIndex = -1
  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i]
    const best = samples[bestIndex]
    if (!sample || !candidate(sample)) continue
    if (!best || sample.elevation > best.elevation) bestIndex = i
  }

  const best = samples[bestIndex]
  if (!best) return null
  if (best.time === aos) return insideEdge(evaluate, best, aos + 1)
  if (best.time === los) return insideEdge(evaluate, best, los - 1)

  const before = samples[bestIndex - 1]
  const after = samples[bestIndex + 1]
  if (!before || !after) return best

  const vertex = parabolicVertex(before, best, after)
  if (vertex === null) return best

  const time = Math.round(vertex)
  if (time <= aos || time >= los || time === best.time) return best

  const elevation = evaluate(time)
  return elevation !== null && elevation > best.elevation ? { time, elevation } : best
}

/**
 * Finds the first pass above the observer's minimum elevation inside
 * `window`. A pass cut by either end of the window is returned with the
 * matching truncation flag.
 */
export function predictPass<E>(
  observer: Observer,
  source: OrbitSource<E>,
  window: TimeSpan,
  options: PassSearchOptions = {}
): PassSearchResult {
  const {
    coarseStepSeconds = DEFAULT_PASS_SEARCH.coarseStepSeconds,
    fineStepSeconds = DEFAULT_PASS_SEARCH.fineStepSeconds,
    toleranceDeg = DEFAULT_PASS_SEARCH.toleranceDeg,
  } = options

  if (!(coarseStepSeconds > 0) || !(fineStepSeconds > 0) || !(toleranceDeg > 0)) {
    throw new RangeError('Pass search steps and tolerance must be positive')
  }

  const start = window.start.getTime()
  const end = window.end.getTime()
  if (!(end > start)) {
    const from = window.start.toISOString()
    throw new RangeError(`Empty search window ${from} .. ${window.end.toISOString()}`)
  }

  const threshold = observer.minElevation
  const tolerance = toRadians(toleranceDeg)
  const stepMs = coarseStepSeconds * 1000
  const evaluate: Evaluate = (time) => elevationAt(observer, source, new Date(time))

  let previous: Sample | null = null
  let aos: { time: number; truncated: boolean } | null = null
  let available = 0

  for (let time = start; ; time = Math.min(time + stepMs, end)) {
    const elevation = evaluate(time)

    if (elevation !== null) {
      available++
      const sample = { time, elevation }
      const above = elevation > threshold

      if (!aos && above) {
        aos = previous
          ? {
              time: refineCrossing(evaluate, previous, sample, threshold, tolerance),
              truncated: false,
            }
          : { time, truncated: true }
      } else if (aos && previous && !above) {
        const los = refineCrossing(evaluate, previous, sample, threshold, tolerance)
        const edges = { aos: aos.time, los, aosTruncated: aos.truncated, losTruncated: false }
        return buildPass(evaluate, edges, fineStepSeconds)
      }

      previous = sample
    }

    if (time >= end) break
  }

  if (aos) {
    const edges = { aos: aos.time, los: end, aosTruncated: aos.truncated, losTruncated: true }
    return buildPass(evaluate, edges, fineStepSeconds)
  }

  if (available === 0) {
    logger.warn(`No state vectors available for ${source.name} in search window`)
    return { found: false, reason: 'propagation-failed' }
  }

  return { found: false, reason: 'no-pass' }
}

const buildPass = (
  evaluate: Evaluate,
  edges: PassEdges,
  fineStepSeconds: number
): PassSearchResult => {
  const { aos, los, aosTruncated, losTruncated } = edges
  const culmination = findCulmination(evaluate, edges, fineStepSeconds * 1000)

  if (!culmination) {
    return { found: false, reason: 'propagation-failed' }
  }

  const pass: Pass = {
    aos: new Date(aos),
    los: new Date(los),
    maxElevation: culmination.elevation,
    maxElevationTime: new Date(culmination.time),
    duration: (los - aos) / 1000,
    aosTruncated,
    losTruncated,
  }

  return { found: true, pass }
}

/** Every pass in `window`, in chronological order. */
export function findPasses<E>(
  observer: Observer,
  source: OrbitSource<E>,
  window: TimeSpan,
  options: PassSearchOptions = {}
): Pass[] {
  const coarseStepMs = (options.coarseStepSeconds ?? DEFAULT_PASS_SEARCH.coarseStepSeconds) * 1000
  const end = window.end.getTime()
  const passes: Pass[] = []
  let from = window.start.getTime()

  while (from < end) {
    const remaining = { start: new Date(from), end: window.end }
    const result = predictPass(observer, source, remaining, options)
    if (!result.found) break

    const { pass } = result
    passes.push(pass)
    const maxElevation = toDegrees(pass.maxElevation).toFixed(1)
    logger.debug(`${source.name}: AOS ${pass.aos.toISOString()} max ${maxElevation}°`)

    if (pass.losTruncated) break
    from = pass.los.getTime() + coarseStepMs
  }

  return passes
}
