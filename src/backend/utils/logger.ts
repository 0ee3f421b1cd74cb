import type { LogLevel } from '@backend/types'
import pino from 'pino'

const createLogger = (level: LogLevel = 'info') =>
  pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  })

let pinoLogger = createLogger()

export const logger = {
  setLevel(level: LogLevel): void {
    pinoLogger = createLogger(level)
  },

  debug(message: string): void {
    pinoLogger.debug(message)
  },

  info(message: string): void {
    pinoLogger.info(message)
  },

  warn(message: string): void {
    pinoLogger.warn(message)
  },

  error(message: string): void {
    pinoLogger.error(message)
  },

  satellite(name: string, message: string): void {
    pinoLogger.info({ satellite: name }, message)
  },

  pass(message: string): void {
    pinoLogger.info({ type: 'pass' }, message)
  },

  track(message: string): void {
    pinoLogger.info({ type: 'track' }, message)
  },
}
