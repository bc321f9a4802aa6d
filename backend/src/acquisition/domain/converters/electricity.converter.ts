/* eslint-disable prettier/prettier */

import type { RawValues } from '../decoding/block-decoder.js'
import { numberField, round, type ConvertOptions, type ValueConverter } from './value-converter.js'

/** Ratio used when the device config does not set one. */
export const DEFAULT_CURRENT_RATIO = 20

const VOLTAGE_SCALE = 0.1
const CURRENT_SCALE = 0.001
const POWER_SCALE = 0.001
const ENERGY_SCALE = 2

/**
 * Three-phase meters:
 * - phase voltage `Ua_n`: raw × 0.1 (V)
 * - phase current `I_n`: raw × 0.001 × ratio (A)
 * - total active power `Pt`: raw × 0.001 × ratio (kW)
 * - imported energy `ImpEp`: raw × 2 (kWh), independent of the ratio
 */
export const electricityConverter: ValueConverter = {
  moduleTypes: ['electricity', 'ElectricityMeter'],

  convert(raw: RawValues, options: ConvertOptions): RawValues {
    const ratio = options.currentRatio ?? DEFAULT_CURRENT_RATIO
    const out: RawValues = {}

    for (const phase of [0, 1, 2]) {
      out[`Ua_${phase}`] = round(numberField(raw, `Ua_${phase}`, 0) * VOLTAGE_SCALE, 1)
    }
    for (const phase of [0, 1, 2]) {
      out[`I_${phase}`] = round(numberField(raw, `I_${phase}`, 0) * CURRENT_SCALE * ratio, 2)
    }
    out.Pt = round(numberField(raw, 'Pt', 0) * POWER_SCALE * ratio, 2)
    out.ImpEp = round(numberField(raw, 'ImpEp', 0) * ENERGY_SCALE, 2)

    return out
  },
}
