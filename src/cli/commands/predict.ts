import { loadConfig } from '@backend/config/config'
import { createObserver, createSgp4Source } from '@backend/prediction/orbit'
import { formatPass, formatPassesTable, predictPasses } from '@backend/prediction/passes'
import { loadTleFile } from '@backend/satellites/tle'
import { logger } from '@backend/utils/logger'
import chalk from 'chalk'
import { parseHours } from '../args'

export async function predictCommand(args: string[]): Promise<void> {
  const config = loadConfig()
  logger.setLevel(config.logLevel)

  const hoursAhead = parseHours(args[0], config.prediction.hoursAhead)
  if (hoursAhead === null) {
    console.error(chalk.red(`Hours must be a positive number, got "${args[0]}"`))
    process.exitCode = 1
    return
  }

  console.log(chalk.bold.cyan('\n  Pass Prediction\n'))
  const { latitude, longitude, altitude } = config.station
  logger.info(`Station: ${latitude.toFixed(4)}°, ${longitude.toFixed(4)}°, ${altitude} m`)

  const source = createSgp4Source(await loadTleFile(config.tle.path))
  const observer = createObserver(config.station, config.minElevation)

  const passes = predictPasses([source], observer, {
    hoursAhead,
    coarseStepSeconds: config.prediction.coarseStepSeconds,
  })

  if (passes.length === 0) {
    logger.warn(`No passes found above ${config.minElevation}° in the next ${hoursAhead} hours`)
    return
  }

  console.log(chalk.bold(`\n  Passes in next ${hoursAhead} hours:\n`))
  console.log(formatPassesTable(passes))

  console.log(chalk.bold('\n  Details:\n'))
  for (const pass of passes) {
    console.log(`  ${formatPass(pass)}`)
  }

  console.log(`\n${chalk.gray(`Total: ${passes.length} passes`)}\n`)
}
