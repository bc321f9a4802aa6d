/* eslint-disable prettier/prettier */

import { createLogger } from '../../../common/infrastructure/logger/index.js'
import type { RawValues } from '../decoding/block-decoder.js'
import { numberField, round, type ValueConverter } from './value-converter.js'

const log = createLogger('vibration-converter')

type Channel = {
  source: string
  target: string
  digits: number
  range: [number, number]
}

/**
 * Register → output mapping for the selected vibration channels.
 * Frequencies arrive already divided by ten through the layout scale.
 */
const CHANNELS: Channel[] = [
  { source: 'DX', target: 'dx', digits: 2, range: [0, 60_000] },
  { source: 'DY', target: 'dy', digits: 2, range: [0, 60_000] },
  { source: 'DZ', target: 'dz', digits: 2, range: [0, 60_000] },
  { source: 'HZX', target: 'freq_x', digits: 1, range: [0, 10_000] },
  { source: 'HZY', target: 'freq_y', digits: 1, range: [0, 10_000] },
  { source: 'HZZ', target: 'freq_z', digits: 1, range: [0, 10_000] },
  { source: 'KX', target: 'acc_peak_x', digits: 2, range: [0, 100] },
  { source: 'AAVGY', target: 'acc_peak_y', digits: 2, range: [0, 100] },
  { source: 'AAVGZ', target: 'acc_peak_z', digits: 2, range: [0, 100] },
  { source: 'VRMSX', target: 'vrms_x', digits: 2, range: [0, 50] },
  { source: 'VRMSY', target: 'vrms_y', digits: 2, range: [0, 50] },
  { source: 'VRMGZ', target: 'vrms_z', digits: 2, range: [0, 50] },
]

/**
 * Keeps only the annotated channels. Out-of-range values are still
 * reported, with a warning, since the sensor range depends on its mode.
 */
export const vibrationConverter: ValueConverter = {
  moduleTypes: ['vibration', 'vibration_selected', 'VibrationSelected'],

  convert(raw: RawValues): RawValues {
    const out: RawValues = {}
    for (const channel of CHANNELS) {
      const value = numberField(raw, channel.source)
      if (value === undefined) continue

      const [min, max] = channel.range
      if (value < min || value > max) {
        log.warn({ channel: channel.target, value, min, max }, 'vibration value out of range')
      }
      out[channel.target] = round(value, channel.digits)
    }
    return out
  },
}
