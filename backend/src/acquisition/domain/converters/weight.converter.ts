/* eslint-disable prettier/prettier */

import type { RawValues } from '../decoding/block-decoder.js'
import { numberField, round, type ConvertOptions, type ValueConverter } from './value-converter.js'

/**
 * Division (scale step) selected by bits 8-11 of the indicator status word.
 * Code 15 is undefined on the indicator and reads as 1.
 */
const DIVISIONS = [1, 2, 5, 10, 20, 50, 0.1, 0.2, 0.5, 0.01, 0.02, 0.05, 0.001, 0.002, 0.005, 1] as const

const STABLE_BIT = 0x20
const OVERLOAD_BIT = 0x80

export type WeighStatus = {
  division: number
  stable: boolean
  overload: boolean
}

export function parseStatusWord(statusWord: number): WeighStatus {
  const word = Math.trunc(statusWord) & 0xffff
  return {
    division: DIVISIONS[(word >> 8) & 0x0f],
    stable: (word & STABLE_BIT) !== 0,
    overload: (word & OVERLOAD_BIT) !== 0,
  }
}

/**
 * Hopper weighing indicator. The gross weight comes from the DWord
 * register, or the Word one when the former reads 0, times the division.
 *
 * `feed_rate` is kg/h drawn from the hopper since the previous reading:
 * positive while discharging, negative while filling, 0 without history.
 */
export const weightConverter: ValueConverter = {
  moduleTypes: ['weight', 'WeighSensor', 'hopper_weight'],

  convert(raw: RawValues, options: ConvertOptions): RawValues {
    const status = parseStatusWord(numberField(raw, 'StatusWord', 0))

    let rawWeight = numberField(raw, 'GrossWeight', 0)
    if (rawWeight === 0) rawWeight = numberField(raw, 'GrossWeight_W', 0)
    const weight = rawWeight * status.division

    let feedRate = 0
    const previousWeight = options.previous ? numberField(options.previous.values, 'weight') : undefined
    if (options.previous && previousWeight !== undefined && options.previous.elapsedSeconds > 0) {
      feedRate = ((previousWeight - weight) / options.previous.elapsedSeconds) * 3600
    }

    return {
      weight: round(weight, 3),
      feed_rate: round(feedRate, 2),
      is_stable: status.stable,
      is_overload: status.overload,
    }
  },
}
