/* eslint-disable prettier/prettier */

import { DecodeError } from '../../../common/domain/errors/decode-error.js'
import type { FieldLayout, FieldType } from '../models/device-config.js'
import type { ReadingValue } from '../models/reading.js'

/**
 * @file block-decoder.ts
 * @description
 * Pure functions turning a raw data block into a flat map of named values
 * (and back, for the simulated transport).
 *
 * Controller memory is big-endian:
 *
 * | type  | width | read as             |
 * |-------|-------|---------------------|
 * | Word  | 2     | uint16              |
 * | DWord | 4     | uint32              |
 * | Int   | 2     | int16               |
 * | DInt  | 4     | int32               |
 * | Real  | 4     | float32             |
 * | Bool  | 1     | bit `bitOffset`     |
 *
 * Struct members are flattened as `<struct>_<member>`, recursively.
 */

export type RawValues = Record<string, ReadingValue>

export type ScalarType = Exclude<FieldType, 'Struct'>

const WIDTH: Record<ScalarType, number> = {
  Word: 2,
  DWord: 4,
  Int: 2,
  DInt: 4,
  Real: 4,
  Bool: 1,
}

function qualify(prefix: string, name: string): string {
  return prefix ? `${prefix}_${name}` : name
}

function checkBounds(buffer: Buffer, name: string, offset: number, width: number): void {
  if (offset < 0 || offset + width > buffer.length) {
    throw new DecodeError(`Field "${name}" lies outside the block`, {
      field: name,
      offset,
      width,
      blockSize: buffer.length,
    })
  }
}

function bitOf(field: FieldLayout, name: string): number {
  const bit = field.bitOffset ?? 0
  if (!Number.isInteger(bit) || bit < 0 || bit > 7) {
    throw new DecodeError(`Field "${name}" has an invalid bit offset`, { field: name, bitOffset: bit })
  }
  return bit
}

function readScalar(buffer: Buffer, type: ScalarType, offset: number, field: FieldLayout, name: string): ReadingValue {
  switch (type) {
    case 'Word':
      return buffer.readUInt16BE(offset)
    case 'DWord':
      return buffer.readUInt32BE(offset)
    case 'Int':
      return buffer.readInt16BE(offset)
    case 'DInt':
      return buffer.readInt32BE(offset)
    case 'Real':
      return buffer.readFloatBE(offset)
    case 'Bool':
      return (buffer.readUInt8(offset) & (1 << bitOf(field, name))) !== 0
  }
}

function decodeField(buffer: Buffer, field: FieldLayout, base: number, prefix: string, out: RawValues): void {
  const offset = base + field.offset
  const name = qualify(prefix, field.name)

  if (field.type === 'Struct') {
    for (const child of field.children ?? []) decodeField(buffer, child, offset, name, out)
    return
  }

  checkBounds(buffer, name, offset, WIDTH[field.type])
  const raw = readScalar(buffer, field.type, offset, field, name)

  if (typeof raw === 'boolean') {
    out[name] = raw
    return
  }
  if (!Number.isFinite(raw)) {
    throw new DecodeError(`Field "${name}" is not a finite number`, { field: name, offset })
  }
  out[name] = raw * (field.scale ?? 1)
}

/**
 * Decodes every field of `layout` from `buffer`.
 *
 * @throws DecodeError when a field does not fit the block, a Bool has a
 * bit offset outside 0..7, or a Real holds NaN/Infinity.
 */
export function decodeBlock(buffer: Buffer, layout: FieldLayout[]): RawValues {
  const out: RawValues = {}
  for (const field of layout) decodeField(buffer, field, 0, '', out)
  return out
}

/**
 * Inverse of {@link decodeBlock} for unscaled values. `valueFor` receives
 * the flattened field name and must return the raw register content.
 */
export function encodeBlock(
  size: number,
  layout: FieldLayout[],
  valueFor: (name: string, type: ScalarType) => ReadingValue,
): Buffer {
  const buffer = Buffer.alloc(size)

  const encode = (field: FieldLayout, base: number, prefix: string): void => {
    const offset = base + field.offset
    const name = qualify(prefix, field.name)

    if (field.type === 'Struct') {
      for (const child of field.children ?? []) encode(child, offset, name)
      return
    }

    checkBounds(buffer, name, offset, WIDTH[field.type])
    const value = valueFor(name, field.type)
    const numeric = typeof value === 'boolean' ? Number(value) : value

    switch (field.type) {
      case 'Word':
        buffer.writeUInt16BE(numeric & 0xffff, offset)
        break
      case 'DWord':
        buffer.writeUInt32BE(numeric >>> 0, offset)
        break
      case 'Int':
        buffer.writeInt16BE(numeric, offset)
        break
      case 'DInt':
        buffer.writeInt32BE(numeric, offset)
        break
      case 'Real':
        buffer.writeFloatBE(numeric, offset)
        break
      case 'Bool': {
        const mask = 1 << bitOf(field, name)
        const current = buffer.readUInt8(offset)
        buffer.writeUInt8(numeric ? current | mask : current & ~mask & 0xff, offset)
        break
      }
    }
  }

  for (const field of layout) encode(field, 0, '')
  return buffer
}
