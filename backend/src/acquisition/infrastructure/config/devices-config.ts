/* eslint-disable prettier/prettier */
import { readFileSync } from 'node:fs'
import path from 'node:path'
import { z } from 'zod'

import { ConfigurationError } from '../../../common/domain/errors/configuration-error.js'
import { createLogger } from '../../../common/infrastructure/logger/index.js'
import { dataValidation } from '../../../common/infrastructure/validation/zod/index.js'
import { hasConverter } from '../../domain/converters/index.js'
import type { DeviceConfig, FieldLayout } from '../../domain/models/device-config.js'

/**
 * @file devices-config.ts
 * @description
 * Loads and validates the device list (`configs/devices.json`).
 *
 * Any problem here is a `ConfigurationError`: the process cannot poll
 * anything meaningful without a valid device list, so startup stops.
 */

const log = createLogger('devices-config')

const fieldTypes = ['Word', 'DWord', 'Int', 'DInt', 'Real', 'Bool', 'Struct'] as const

const fieldSchema: z.ZodType<FieldLayout> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      type: z.enum(fieldTypes),
      offset: z.number().int().nonnegative(),
      bitOffset: z.number().int().min(0).max(7).optional(),
      scale: z.number().finite().optional(),
      children: z.array(fieldSchema).min(1).optional(),
    })
    .superRefine((field, ctx) => {
      if (field.type === 'Struct' && !field.children) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Struct fields need children' })
      }
      if (field.type !== 'Struct' && field.children) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field.type} fields cannot have children` })
      }
      if (field.bitOffset !== undefined && field.type !== 'Bool') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'bitOffset only applies to Bool fields' })
      }
    }),
)

const deviceSchema = z.object({
  deviceId: z.string().min(1),
  deviceType: z.string().min(1),
  moduleType: z.string().min(1),
  moduleTag: z.string().min(1),
  block: z.object({
    blockId: z.number().int().positive(),
    offset: z.number().int().nonnegative(),
    size: z.number().int().positive(),
  }),
  fields: z.array(fieldSchema).min(1),
  currentRatio: z.number().positive().optional(),
})

export const devicesFileSchema = z
  .object({ devices: z.array(deviceSchema).min(1) })
  .superRefine(({ devices }, ctx) => {
    const seen = new Set<string>()
    devices.forEach((device, index) => {
      if (seen.has(device.deviceId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['devices', index, 'deviceId'],
          message: `duplicate deviceId "${device.deviceId}"`,
        })
      }
      seen.add(device.deviceId)
    })
  })

/** Validates an already parsed device file. */
export function parseDevicesConfig(data: unknown, source = 'devices config'): DeviceConfig[] {
  const { devices } = dataValidation(devicesFileSchema, data, {
    toError: (_message, issues) =>
      new ConfigurationError(`Invalid ${source}: ${issues.join(' | ')}`, { source, issues }),
  })

  for (const device of devices) {
    if (!hasConverter(device.moduleType)) {
      log.info({ deviceId: device.deviceId, moduleType: device.moduleType }, 'no converter, raw values are kept')
    }
  }
  return devices
}

/**
 * Reads the device file. Relative paths resolve against the working
 * directory.
 */
export function loadDevicesConfig(filePath: string): DeviceConfig[] {
  const absolute = path.resolve(process.cwd(), filePath)

  let text: string
  try {
    text = readFileSync(absolute, 'utf8')
  } catch (cause) {
    throw new ConfigurationError(`Cannot read device config at ${absolute}`, { path: absolute }, cause)
  }

  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (cause) {
    throw new ConfigurationError(`Device config at ${absolute} is not valid JSON`, { path: absolute }, cause)
  }

  const devices = parseDevicesConfig(data, absolute)
  log.info({ path: absolute, devices: devices.length }, 'device config loaded')
  return devices
}
