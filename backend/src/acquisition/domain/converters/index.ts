/* eslint-disable prettier/prettier */

import type { RawValues } from '../decoding/block-decoder.js'
import { electricityConverter } from './electricity.converter.js'
import { pm10Converter } from './pm10.converter.js'
import { temperatureConverter } from './temperature.converter.js'
import type { ConvertOptions, ValueConverter } from './value-converter.js'
import { vibrationConverter } from './vibration.converter.js'
import { weightConverter } from './weight.converter.js'

/**
 * @file converters/index.ts
 * @description
 * Registry of unit converters keyed by module type (and aliases).
 * Module types without a converter keep their decoded values.
 */

const CONVERTERS: ValueConverter[] = [
  temperatureConverter,
  electricityConverter,
  pm10Converter,
  vibrationConverter,
  weightConverter,
]

const registry = new Map<string, ValueConverter>(
  CONVERTERS.flatMap((converter) => converter.moduleTypes.map((type): [string, ValueConverter] => [type, converter])),
)

export function hasConverter(moduleType: string): boolean {
  return registry.has(moduleType)
}

export function convertValues(moduleType: string, raw: RawValues, options: ConvertOptions = {}): RawValues {
  const converter = registry.get(moduleType)
  if (!converter) return { ...raw }
  return converter.convert(raw, options)
}

export type { ConvertOptions, ValueConverter }
