/* eslint-disable prettier/prettier */

/**
 * @file device-config.ts
 * @description
 * Declarative description of what to read from the field controller and
 * how to interpret it. Loaded once at startup from `configs/devices.json`.
 *
 * Each entry is one module mapped into a data block: the poll scheduler
 * reads `block.size` bytes at `block.offset` of block `block.blockId` and
 * decodes them with `fields`. Field offsets are relative to `block.offset`.
 */

export type FieldType = 'Word' | 'DWord' | 'Int' | 'DInt' | 'Real' | 'Bool' | 'Struct'

export type FieldLayout = {
  name: string
  type: FieldType
  /** Byte offset relative to the parent (module start or enclosing struct). */
  offset: number
  /** Bit inside the byte, Bool only (0 = least significant). */
  bitOffset?: number
  /** Multiplier applied to numeric values after decoding. */
  scale?: number
  /** Struct members; decoded as `<struct>_<member>`. */
  children?: FieldLayout[]
}

export type BlockAddress = {
  blockId: number
  offset: number
  size: number
}

export type DeviceConfig = {
  deviceId: string
  deviceType: string
  moduleType: string
  moduleTag: string
  block: BlockAddress
  fields: FieldLayout[]
  /** Current transformer ratio for electricity meters. */
  currentRatio?: number
}
