import path from 'node:path'

import { loadDevicesConfig, parseDevicesConfig } from './devices-config.js'
import { ConfigurationError } from '../../../common/domain/errors/configuration-error.js'

function device(overrides: Record<string, unknown> = {}) {
  return {
    deviceId: 'kiln_1',
    deviceType: 'roller_kiln',
    moduleType: 'temperature',
    moduleTag: 'zone_1_temp',
    block: { blockId: 9, offset: 0, size: 2 },
    fields: [{ name: 'Temperature', type: 'Int', offset: 0 }],
    ...overrides,
  }
}

describe('devices config', () => {
  it('accepts a valid device list with nested structs', () => {
    const devices = parseDevicesConfig({
      devices: [
        device(),
        device({
          deviceId: 'meter_1',
          moduleType: 'electricity',
          currentRatio: 40,
          block: { blockId: 9, offset: 4, size: 8 },
          fields: [
            {
              name: 'Ua',
              type: 'Struct',
              offset: 0,
              children: [
                { name: '0', type: 'Real', offset: 0 },
                { name: '1', type: 'Real', offset: 4 },
              ],
            },
          ],
        }),
      ],
    })

    expect(devices.map((d) => d.deviceId)).toEqual(['kiln_1', 'meter_1'])
    expect(devices[1].currentRatio).toBe(40)
    expect(devices[1].fields[0].children?.map((c) => c.name)).toEqual(['0', '1'])
  })

  it('rejects duplicate device ids', () => {
    const parse = () => parseDevicesConfig({ devices: [device(), device()] }, 'test.json')

    expect(parse).toThrow(ConfigurationError)
    expect(parse).toThrow('Invalid test.json: devices.1.deviceId -> duplicate deviceId "kiln_1"')
  })

  it('rejects a struct without members', () => {
    expect(() =>
      parseDevicesConfig({ devices: [device({ fields: [{ name: 'Ua', type: 'Struct', offset: 0 }] })] }, 'test.json'),
    ).toThrow('Invalid test.json: devices.0.fields.0 -> Struct fields need children')
  })

  it('rejects a bit offset outside the byte', () => {
    expect(() =>
      parseDevicesConfig({
        devices: [device({ fields: [{ name: 'Running', type: 'Bool', offset: 0, bitOffset: 8 }] })],
      }),
    ).toThrow(ConfigurationError)
  })

  it('rejects an unknown field type', () => {
    expect(() =>
      parseDevicesConfig({ devices: [device({ fields: [{ name: 'T', type: 'LReal', offset: 0 }] })] }),
    ).toThrow(ConfigurationError)
  })

  it('rejects an empty device list', () => {
    expect(() => parseDevicesConfig({ devices: [] })).toThrow(ConfigurationError)
  })

  it('fails with a ConfigurationError when the file is missing', () => {
    expect(() => loadDevicesConfig(path.join(__dirname, 'no-such-file.json'))).toThrow(
      /^Cannot read device config at /,
    )
  })

  it('loads the shipped device file', () => {
    const devices = loadDevicesConfig(path.resolve(__dirname, '../../../../configs/devices.json'))

    expect(devices).toHaveLength(7)
    expect(new Set(devices.map((d) => d.moduleType))).toEqual(
      new Set(['temperature', 'electricity', 'vibration', 'pm10', 'device_status', 'weight']),
    )
  })
})
