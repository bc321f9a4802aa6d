import { Reading } from '../../src/acquisition/domain/models/reading.js'

export function makeReading(deviceId: string, at: string, values: Record<string, number | boolean> = { temperature: 21.5 }): Reading {
  return new Reading({
    deviceId,
    deviceType: 'roller_kiln',
    moduleType: 'temperature',
    moduleTag: `${deviceId}_temp`,
    blockId: 9,
    timestamp: new Date(at),
    values,
  })
}
