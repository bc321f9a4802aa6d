/* eslint-disable prettier/prettier */

import type { Reading, ReadingValue } from '../../../acquisition/domain/models/reading.js'

/**
 * @file batch-point.ts
 * @description
 * A Reading adapted to the time-series write schema.
 *
 * | part        | content                                                  |
 * |-------------|----------------------------------------------------------|
 * | measurement | `sensor_data`                                            |
 * | tags        | device_id, device_type, module_type, module_tag, block_id |
 * | fields      | converted values                                         |
 * | time        | reading timestamp                                        |
 *
 * `(measurement, device_id, module_tag, time)` identifies a point: writing
 * the same point twice overwrites it.
 */

export const SENSOR_MEASUREMENT = 'sensor_data'

export type BatchPointTags = {
  device_id: string
  device_type: string
  module_type: string
  module_tag: string
  block_id: string
}

export type BatchPoint = {
  measurement: string
  tags: BatchPointTags
  fields: Record<string, ReadingValue>
  time: Date
}

export function toBatchPoint(reading: Reading): BatchPoint {
  return {
    measurement: SENSOR_MEASUREMENT,
    tags: {
      device_id: reading.deviceId,
      device_type: reading.deviceType,
      module_type: reading.moduleType,
      module_tag: reading.moduleTag,
      block_id: String(reading.blockId),
    },
    fields: { ...reading.values },
    time: new Date(reading.timestamp.getTime()),
  }
}
