/* eslint-disable prettier/prettier */

import type { RawValues } from '../decoding/block-decoder.js'

/**
 * @file value-converter.ts
 * @description
 * Contract of a per-module-type unit converter plus the small numeric
 * helpers every converter shares.
 */

export type ConvertOptions = {
  /** Current transformer ratio (electricity meters). */
  currentRatio?: number
  /** Last converted values of the same device and the seconds since then. */
  previous?: { values: RawValues; elapsedSeconds: number }
}

export interface ValueConverter {
  /** Canonical module type plus the aliases accepted in device configs. */
  readonly moduleTypes: readonly string[]

  convert(raw: RawValues, options: ConvertOptions): RawValues
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

/**
 * Numeric view of a raw field: booleans count as 0/1, a missing field
 * yields `fallback`.
 */
export function numberField(raw: RawValues, name: string, fallback: number): number
export function numberField(raw: RawValues, name: string): number | undefined
export function numberField(raw: RawValues, name: string, fallback?: number): number | undefined {
  const value = raw[name]
  if (value === undefined) return fallback
  return typeof value === 'boolean' ? Number(value) : value
}
