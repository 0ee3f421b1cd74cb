import { loadConfig } from '@backend/config/config'
import { writeTrackReport } from '@backend/export/report'
import { formatDopplerShift, formatFrequency } from '@backend/prediction/doppler'
import { createObserver, createSgp4Source, toDegrees } from '@backend/prediction/orbit'
import { predictPass } from '@backend/prediction/pass-predictor'
import { collectTrack } from '@backend/prediction/tracking'
import { loadTleFile } from '@backend/satellites/tle'
import type { Observation } from '@backend/types'
import { generateReportName } from '@backend/utils/fs'
import { logger } from '@backend/utils/logger'
import chalk from 'chalk'
import { parseHours } from '../args'

// Console rows are thinned to this interval; the report keeps every tick
const PRINT_INTERVAL_SECONDS = 30

const formatRow = (o: Observation): string =>
  [
    o.timestamp.toISOString().slice(11, 19),
    toDegrees(o.elevation).toFixed(2).padStart(7),
    toDegrees(o.azimuth).toFixed(2).padStart(7),
    o.rangeRate.toFixed(1).padStart(9),
    formatDopplerShift(o.downlink.shift).padStart(11),
    formatFrequency(o.downlink.received).padStart(18),
    o.uplink ? formatFrequency(o.uplink.transmitted).padStart(18) : '',
  ].join('  ')

export async function trackCommand(args: string[]): Promise<void> {
  const config = loadConfig()
  logger.setLevel(config.logLevel)

  const hoursAhead = parseHours(args[0], config.prediction.hoursAhead)
  if (hoursAhead === null) {
    console.error(chalk.red(`Hours must be a positive number, got "${args[0]}"`))
    process.exitCode = 1
    return
  }
  const source = createSgp4Source(await loadTleFile(config.tle.path))
  const observer = createObserver(config.station, config.minElevation)
  const now = new Date()

  console.log(chalk.bold.cyan(`\n  Doppler Tracking: ${source.name}\n`))

  const result = predictPass(
    observer,
    source,
    { start: now, end: new Date(now.getTime() + hoursAhead * 60 * 60 * 1000) },
    { coarseStepSeconds: config.prediction.coarseStepSeconds }
  )

  if (!result.found) {
    logger.warn(`No pass of ${source.name} in the next ${hoursAhead} hours (${result.reason})`)
    return
  }

  const { pass } = result
  const maxElevation = toDegrees(pass.maxElevation).toFixed(1)
  logger.pass(`AOS ${pass.aos.toISOString()}  LOS ${pass.los.toISOString()}  max ${maxElevation}°`)

  const { observations, summary } = collectTrack(observer, source, pass, {
    downlinkHz: config.radio.downlinkHz,
    uplinkHz: config.radio.uplinkHz,
    cadenceSeconds: config.tracking.cadenceSeconds,
    rangeRate: {
      stepSeconds: config.tracking.rangeRateStepSeconds,
      method: config.tracking.rangeRateMethod,
    },
  })

  const header = [
    'UTC'.padEnd(8),
    'Elev°'.padStart(7),
    'Az°'.padStart(7),
    'Vr m/s'.padStart(9),
    'Doppler'.padStart(11),
    'RX'.padStart(18),
    config.radio.uplinkHz ? 'TX'.padStart(18) : '',
  ].join('  ')
  console.log(chalk.bold(`\n  ${header}`))

  const printEvery = Math.max(
    1,
    Math.round(PRINT_INTERVAL_SECONDS / config.tracking.cadenceSeconds)
  )
  observations
    .filter((_, index) => index % printEvery === 0)
    .forEach((o) => console.log(`  ${formatRow(o)}`))

  if (summary.stopReason !== 'completed') {
    const reason = summary.lastError ? ` (${summary.lastError.message})` : ''
    logger.warn(`Tracking stopped early: ${summary.stopReason}${reason}`)
  }

  const baseName = generateReportName(source.name, pass.aos)
  const files = await writeTrackReport(config.export.dir, baseName, {
    satellite: source.name,
    pass,
    observations,
    summary,
  })

  console.log(
    chalk.gray(
      `\n  ${summary.emitted} observations, ${summary.skipped} dropped, ` +
        `${summary.belowHorizon} below horizon`
    )
  )
  console.log(chalk.green(`  Report: ${files.observations}\n`))
}
