/* eslint-disable prettier/prettier */

import type { RawValues } from '../decoding/block-decoder.js'
import { numberField, round, type ValueConverter } from './value-converter.js'

/**
 * Dust sensors already report µg/m³. Older firmware exposes a single
 * `Concentration` register instead of `PM10`.
 */
export const pm10Converter: ValueConverter = {
  moduleTypes: ['pm10', 'PM10Sensor'],

  convert(raw: RawValues): RawValues {
    const out: RawValues = {}

    const pm10 = numberField(raw, 'PM10') ?? numberField(raw, 'Concentration')
    const pm25 = numberField(raw, 'PM2_5') ?? numberField(raw, 'PM2.5')
    const pm1 = numberField(raw, 'PM1_0') ?? numberField(raw, 'PM1.0')

    if (pm10 !== undefined) {
      out.pm10 = round(pm10, 1)
      out.concentration = round(pm10, 1)
    }
    if (pm25 !== undefined) out.pm2_5 = round(pm25, 1)
    if (pm1 !== undefined) out.pm1_0 = round(pm1, 1)

    if (Object.keys(out).length === 0) out.concentration = 0
    return out
  },
}
