import type { FrequencyPair } from '@backend/types'

export const SPEED_OF_LIGHT = 299792458

/** Shift in Hz seen across a link whose range changes at `rangeRate` m/s. */
export const dopplerShift = (frequency: number, rangeRate: number): number =>
  -frequency * (rangeRate / SPEED_OF_LIGHT)

/** Frequency heard on the ground for a satellite transmitting `frequency`. */
export function correctDownlink(frequency: number, rangeRate: number): FrequencyPair {
  const shift = dopplerShift(frequency, rangeRate)
  return { transmitted: frequency, received: frequency + shift, shift }
}

/** Satellite transmit frequency recovered from what was heard on the ground. */
export const inverseDownlink = (received: number, rangeRate: number): number =>
  received / (1 - rangeRate / SPEED_OF_LIGHT)

/**
 * Frequency the ground station must transmit so the satellite hears
 * `frequency` once the uplink shift is applied.
 */
export function correctUplink(frequency: number, rangeRate: number): FrequencyPair {
  const transmitted = frequency / (1 - rangeRate / SPEED_OF_LIGHT)
  return { transmitted, received: frequency, shift: frequency - transmitted }
}

export function formatFrequency(hz: number): string {
  if (hz >= 1e9) return `${(hz / 1e9).toFixed(6)} GHz`
  if (hz >= 1e6) return `${(hz / 1e6).toFixed(6)} MHz`
  if (hz >= 1e3) return `${(hz / 1e3).toFixed(2)} kHz`
  return `${hz.toFixed(0)} Hz`
}

export function formatDopplerShift(hz: number): string {
  const sign = hz >= 0 ? '+' : ''
  if (Math.abs(hz) >= 1e3) return `${sign}${(hz / 1e3).toFixed(2)} kHz`
  return `${sign}${hz.toFixed(0)} Hz`
}
