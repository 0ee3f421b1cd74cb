import { join } from 'node:path'
import type { Observation, Pass } from '@backend/types'
import { toDegrees } from '../prediction/orbit'
import type { TrackingSummary } from '../prediction/tracking'
import { writeTextFile } from '../utils/fs'

export const OBSERVATION_COLUMNS = [
  'timestamp',
  'azimuth_deg',
  'elevation_deg',
  'range_km',
  'range_rate_m_s',
  'doppler_shift_hz',
  'freq_rx_hz',
] as const

export const PASS_SUMMARY_COLUMNS = [
  'aos_timestamp',
  'los_timestamp',
  'max_elevation_timestamp',
  'max_elevation_deg',
] as const

export interface ObservationRecord {
  timestamp: string
  azimuth_deg: number
  elevation_deg: number
  range_km: number
  range_rate_m_s: number
  doppler_shift_hz: number
  freq_rx_hz: number
}

export interface PassSummaryRecord {
  aos_timestamp: string
  los_timestamp: string
  max_elevation_timestamp: string
  max_elevation_deg: number
}

export interface TrackReport {
  satellite: string
  pass?: Pass
  observations: Observation[]
  summary?: TrackingSummary
}

export interface ReportFiles {
  observations: string
  pass?: string
  json: string
}

export function toObservationRecord(observation: Observation): ObservationRecord {
  return {
    timestamp: observation.timestamp.toISOString(),
    azimuth_deg: toDegrees(observation.azimuth),
    elevation_deg: toDegrees(observation.elevation),
    range_km: observation.range / 1000,
    range_rate_m_s: observation.rangeRate,
    doppler_shift_hz: observation.downlink.shift,
    freq_rx_hz: observation.downlink.received,
  }
}

export function toPassSummary(pass: Pass): PassSummaryRecord {
  return {
    aos_timestamp: pass.aos.toISOString(),
    los_timestamp: pass.los.toISOString(),
    max_elevation_timestamp: pass.maxElevationTime.toISOString(),
    max_elevation_deg: toDegrees(pass.maxElevation),
  }
}

/**
 * Ascending by timestamp with one observation per instant, whatever order the
 * ticks were computed in.
 */
export function orderObservations(observations: Observation[]): Observation[] {
  const byTime = new Map<number, Observation>()
  for (const observation of observations) {
    const key = observation.timestamp.getTime()
    if (!byTime.has(key)) byTime.set(key, observation)
  }

  return [...byTime.entries()].sort(([a], [b]) => a - b).map(([, observation]) => observation)
}

const formatObservationRow = (record: ObservationRecord): string =>
  [
    record.timestamp,
    record.azimuth_deg.toFixed(6),
    record.elevation_deg.toFixed(6),
    record.range_km.toFixed(6),
    record.range_rate_m_s.toFixed(6),
    record.doppler_shift_hz.toFixed(3),
    record.freq_rx_hz.toFixed(3),
  ].join(',')

export function formatObservationsCsv(observations: Observation[]): string {
  const rows = orderObservations(observations).map((o) =>
    formatObservationRow(toObservationRecord(o))
  )
  return `${[OBSERVATION_COLUMNS.join(','), ...rows].join('\n')}\n`
}

export function formatPassSummaryCsv(pass: Pass): string {
  const record = toPassSummary(pass)
  const row = [
    record.aos_timestamp,
    record.los_timestamp,
    record.max_elevation_timestamp,
    record.max_elevation_deg.toFixed(6),
  ].join(',')

  return `${PASS_SUMMARY_COLUMNS.join(',')}\n${row}\n`
}

export function formatTrackJson(report: TrackReport): string {
  return JSON.stringify(
    {
      satellite: report.satellite,
      pass: report.pass && {
        ...toPassSummary(report.pass),
        aos_truncated: report.pass.aosTruncated,
        los_truncated: report.pass.losTruncated,
      },
      summary: report.summary && {
        emitted: report.summary.emitted,
        skipped: report.summary.skipped,
        below_horizon: report.summary.belowHorizon,
        stop_reason: report.summary.stopReason,
        last_error: report.summary.lastError?.message,
      },
      observations: orderObservations(report.observations).map(toObservationRecord),
    },
    null,
    2
  )
}

export async function writeTrackReport(
  dir: string,
  baseName: string,
  report: TrackReport
): Promise<ReportFiles> {
  const files: ReportFiles = {
    observations: join(dir, `${baseName}.csv`),
    json: join(dir, `${baseName}.json`),
  }

  await writeTextFile(files.observations, formatObservationsCsv(report.observations))
  await writeTextFile(files.json, formatTrackJson(report))

  if (report.pass) {
    files.pass = join(dir, `${baseName}.pass.csv`)
    await writeTextFile(files.pass, formatPassSummaryCsv(report.pass))
  }

  return files
}
