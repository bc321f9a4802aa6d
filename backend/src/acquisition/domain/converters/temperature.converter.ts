/* eslint-disable prettier/prettier */

import type { RawValues } from '../decoding/block-decoder.js'
import { numberField, round, type ValueConverter } from './value-converter.js'

/**
 * Temperature sensors store tenths of a degree in a signed 16-bit word
 * (250 → 25.0 °C). Values below -10 °C come from probes wired with
 * reversed polarity and are reported as their absolute value.
 */
export const temperatureConverter: ValueConverter = {
  moduleTypes: ['temperature', 'TemperatureSensor'],

  convert(raw: RawValues): RawValues {
    const tenths = Math.trunc(numberField(raw, 'Temperature', 0))
    let temperature = tenths * 0.1
    if (temperature < -10) temperature = Math.abs(temperature)
    return { temperature: round(temperature, 1) }
  },
}
