import chalk from 'chalk'
import { predictCommand } from './commands/predict'
import { trackCommand } from './commands/track'

const HELP_TEXT = `
${chalk.bold.cyan('Pass Doppler Tracker')}

${chalk.bold('Usage:')}
  tsx src/cli/main.ts <command> [hours]

${chalk.bold('Commands:')}
  ${chalk.green('predict')}   Show upcoming passes for the configured station
  ${chalk.green('track')}     Track the next pass and export Doppler-corrected observations
  ${chalk.green('help')}      Show this help message

${chalk.bold('Examples:')}
  npm run predict              Show passes for the next 24 hours
  npm run predict -- 48        Show passes for the next 48 hours
  npm run track                Track the next pass and write a report

${chalk.bold('Environment:')}
  STATION_LATITUDE, STATION_LONGITUDE, DOWNLINK_FREQUENCY_HZ and TLE_FILE
  (copy .env.example to .env)
`

async function main(): Promise<void> {
  const command = process.argv[2] || 'help'
  const args = process.argv.slice(3)

  switch (command) {
    case 'predict':
      await predictCommand(args)
      break

    case 'track':
      await trackCommand(args)
      break

    case 'help':
    case '--help':
    case '-h':
      console.log(HELP_TEXT)
      break

    default:
      console.error(chalk.red(`Unknown command: ${command}`))
      console.log(HELP_TEXT)
      process.exit(1)
  }
}

main().catch((error) => {
  console.error(chalk.red('Fatal error:'), error)
  process.exit(1)
})
