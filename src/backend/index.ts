export { ElementSetError, PropagationError, isPropagationError } from './errors'
export type { PropagationErrorCode } from './errors'

export {
  DEG_TO_RAD,
  RAD_TO_DEG,
  createObserver,
  createSgp4Source,
  parseElements,
  propagateSgp4,
  stateAt,
  toDegrees,
  toRadians,
} from './prediction/orbit'

export {
  ZENITH_ELEVATION,
  horizonBasis,
  observe,
  observerPosition,
  toTopocentric,
} from './prediction/topocentric'
export type { HorizonBasis } from './prediction/topocentric'

export { DEFAULT_RANGE_RATE_STEP_SECONDS, estimateRangeRate } from './prediction/range-rate'
export type { RangeRateEstimate, RangeRateOptions } from './prediction/range-rate'

export {
  DEFAULT_PASS_SEARCH,
  elevationAt,
  findPasses,
  predictPass,
} from './prediction/pass-predictor'
export type { PassSearchOptions } from './prediction/pass-predictor'

export {
  formatPass,
  formatPassesTable,
  predictPasses,
} from './prediction/passes'
export type { PredictionOptions } from './prediction/passes'

export {
  SPEED_OF_LIGHT,
  correctDownlink,
  correctUplink,
  dopplerShift,
  formatDopplerShift,
  formatFrequency,
  inverseDownlink,
} from './prediction/doppler'

export { DEFAULT_TRACKING, collectTrack, observeTick, trackPass } from './prediction/tracking'
export type {
  TickOptions,
  TrackResult,
  TrackingOptions,
  TrackingSummary,
} from './prediction/tracking'

export {
  OBSERVATION_COLUMNS,
  PASS_SUMMARY_COLUMNS,
  formatObservationsCsv,
  formatPassSummaryCsv,
  formatTrackJson,
  orderObservations,
  toObservationRecord,
  toPassSummary,
  writeTrackReport,
} from './export/report'
export type {
  ObservationRecord,
  PassSummaryRecord,
  ReportFiles,
  TrackReport,
} from './export/report'

export { loadTleFile, parseTleText } from './satellites/tle'
export { loadConfig } from './config/config'

export type * from './types'
