import type { Observer, OrbitSource, SatellitePass } from '@backend/types'
import { logger } from '../utils/logger'
import { toDegrees } from './orbit'
import { findPasses, type PassSearchOptions } from './pass-predictor'

export interface PredictionOptions extends PassSearchOptions {
  startTime?: Date
  hoursAhead?: number
}

export function predictPasses(
  sources: OrbitSource[],
  observer: Observer,
  options: PredictionOptions = {}
): SatellitePass[] {
  const { startTime = new Date(), hoursAhead = 24, ...search } = options
  const endTime = new Date(startTime.getTime() + hoursAhead * 60 * 60 * 1000)
  const allPasses: SatellitePass[] = []

  for (const source of sources) {
    const passes = findPasses(observer, source, { start: startTime, end: endTime }, search)

    passes.length === 0
      ? logger.satellite(source.name, `No passes in the next ${hoursAhead} hours`)
      : logger.debug(`Found ${passes.length} passes for ${source.name}`)

    allPasses.push(...passes.map((pass) => ({ ...pass, satellite: source.name })))
  }

  return allPasses.sort((a, b) => a.aos.getTime() - b.aos.getTime())
}

const formatUtc = (date: Date): string => date.toISOString().slice(0, 19).replace('T', ' ')

const formatUtcTime = (date: Date): string => date.toISOString().slice(11, 19)

export function formatPass(pass: SatellitePass): string {
  const duration = Math.round(pass.duration / 60)
  const truncated = pass.aosTruncated || pass.losTruncated ? ' [partial]' : ''

  const maxElevation = toDegrees(pass.maxElevation).toFixed(1)
  const window = `${formatUtc(pass.aos)} → ${formatUtcTime(pass.los)} UTC`

  return `${pass.satellite}: ${window} (${duration}min, max ${maxElevation}°)${truncated}`
}

export function formatPassesTable(passes: SatellitePass[], now = new Date()): string {
  const lines = [
    '┌─────────────┬─────────────────────┬──────────┬───────────┬──────────┐',
    '│ Satellite   │ AOS (UTC)           │ Duration │ Max Elev  │ Status   │',
    '├─────────────┼─────────────────────┼──────────┼───────────┼──────────┤',
  ]

  for (const pass of passes) {
    const name = pass.satellite.slice(0, 11).padEnd(11)
    const start = formatUtc(pass.aos).padEnd(19)
    const duration = `${Math.round(pass.duration / 60)}min`.padEnd(8)
    const elev = `${toDegrees(pass.maxElevation).toFixed(1)}°`.padEnd(9)

    let status = 'Pending'
    if (now >= pass.aos && now <= pass.los) status = 'Active'
    else if (now > pass.los) status = 'Passed'

    lines.push(`│ ${name} │ ${start} │ ${duration} │ ${elev} │ ${status.padEnd(8)} │`)
  }

  lines.push('└─────────────┴─────────────────────┴──────────┴───────────┴──────────┘')

  return lines.join('\n')
}
