import type { TrackerConfig } from '@backend/types'
import { z } from 'zod'

const envSchema = z.object({
  STATION_LATITUDE: z.coerce.number().min(-90).max(90),
  STATION_LONGITUDE: z.coerce.number().min(-180).max(180),
  STATION_ALTITUDE: z.coerce.number().default(0),
  MIN_ELEVATION: z.coerce.number().min(0).max(90).default(0),

  DOWNLINK_FREQUENCY_HZ: z.coerce.number().positive(),
  UPLINK_FREQUENCY_HZ: z.coerce.number().positive().optional(),

  SAMPLE_CADENCE_SECONDS: z.coerce.number().positive().default(1),
  // Forward-difference step for range-rate; Doppler accuracy depends on it
  RANGE_RATE_STEP_SECONDS: z.coerce.number().positive().default(10),
  RANGE_RATE_METHOD: z.enum(['forward', 'central', 'analytic']).default('forward'),

  COARSE_STEP_SECONDS: z.coerce.number().positive().default(30),
  PREDICTION_HOURS: z.coerce.number().positive().max(24 * 14).default(24),

  TLE_FILE: z.string().default('./data/satellite.tle'),
  EXPORT_DIR: z.string().default('./export'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
})

function parseEnv(): z.infer<typeof envSchema> {
  const result = envSchema.safeParse(process.env)

  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n')
    throw new Error(`Environment validation failed:\n${errors}`)
  }

  return result.data
}

export function loadConfig(): TrackerConfig {
  const env = parseEnv()

  return {
    station: {
      latitude: env.STATION_LATITUDE,
      longitude: env.STATION_LONGITUDE,
      altitude: env.STATION_ALTITUDE,
    },
    minElevation: env.MIN_ELEVATION,
    radio: {
      downlinkHz: env.DOWNLINK_FREQUENCY_HZ,
      uplinkHz: env.UPLINK_FREQUENCY_HZ,
    },
    tracking: {
      cadenceSeconds: env.SAMPLE_CADENCE_SECONDS,
      rangeRateStepSeconds: env.RANGE_RATE_STEP_SECONDS,
      rangeRateMethod: env.RANGE_RATE_METHOD,
    },
    prediction: {
      coarseStepSeconds: env.COARSE_STEP_SECONDS,
      hoursAhead: env.PREDICTION_HOURS,
    },
    tle: {
      path: env.TLE_FILE,
    },
    export: {
      dir: env.EXPORT_DIR,
    },
    logLevel: env.LOG_LEVEL,
  }
}
