import { beforeEach, describe, expect, it, vi } from 'vitest'

const { created, records } = vi.hoisted(() => ({
  created: [] as unknown[],
  records: [] as unknown[][],
}))

vi.mock('pino', () => {
  const record =
    (level: string) =>
    (...args: unknown[]) =>
      records.push([level, ...args])

  return {
    default: (options: unknown) => {
      created.push(options)
      return {
        debug: record('debug'),
        info: record('info'),
        warn: record('warn'),
        error: record('error'),
      }
    },
  }
})

const { logger } = await vi.importActual<typeof import('@backend/utils/logger')>(
  '@backend/utils/logger'
)

describe('logger', () => {
  beforeEach(() => {
    records.length = 0
  })

  it('should pass plain messages straight to pino', () => {
    logger.warn('Dropped tick')
    logger.error('Giving up')

    expect(records).toEqual([
      ['warn', 'Dropped tick'],
      ['error', 'Giving up'],
    ])
  })

  it('should tag satellite, pass and track lines', () => {
    logger.satellite('NOAA 19', 'No passes')
    logger.pass('AOS')
    logger.track('Tracking')

    expect(records).toEqual([
      ['info', { satellite: 'NOAA 19' }, 'No passes'],
      ['info', { type: 'pass' }, 'AOS'],
      ['info', { type: 'track' }, 'Tracking'],
    ])
  })

  it('should recreate the pino instance at the new level', () => {
    logger.setLevel('debug')

    expect(created.at(-1)).toMatchObject({ level: 'debug', transport: { target: 'pino-pretty' } })
  })
})
