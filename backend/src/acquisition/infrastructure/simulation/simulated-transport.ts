/* eslint-disable prettier/prettier */
import type { Logger } from 'pino'

import { DecodeError } from '../../../common/domain/errors/decode-error.js'
import { createLogger } from '../../../common/infrastructure/logger/index.js'
import { encodeBlock, type ScalarType } from '../../domain/decoding/block-decoder.js'
import type { DeviceConfig } from '../../domain/models/device-config.js'
import type { ReadingValue } from '../../domain/models/reading.js'
import type { FieldTransport } from '../../domain/ports/field-transport.js'

/**
 * @file simulated-transport.ts
 * @description
 * FieldTransport used in mock mode. Every read re-encodes fresh raw values
 * for the devices mapped into the requested block, so the whole pipeline
 * (decode, convert, batch, push) runs exactly as against a controller.
 */

/** Raw register ranges by field name, before scale and conversion. */
const RAW_RANGES: Array<[RegExp, number, number]> = [
  [/^Temperature$/, 7_000, 12_000],
  [/^Ua_/, 2_150, 2_350],
  [/^I_/, 200, 2_000],
  [/^Pt$/, 500, 5_000],
  [/^ImpEp$/, 10_000, 20_000],
  [/^D[XYZ]$/, 0, 200],
  [/^HZ[XYZ]$/, 100, 600],
  [/^PM/, 50, 800],
  // stable, division 0.1 kg
  [/^StatusWord$/, 0x0620, 0x0620],
  [/^(Gross|Net)Weight/, 8_000, 12_000],
]

const DEFAULT_RANGE: Record<ScalarType, [number, number]> = {
  Word: [0, 1_000],
  DWord: [0, 100_000],
  Int: [-1_000, 1_000],
  DInt: [0, 100_000],
  Real: [0, 100],
  Bool: [0, 1],
}

export type SimulatedTransportOptions = {
  endpoint?: string
  /** Uniform source in [0, 1). */
  random?: () => number
  logger?: Logger
}

export class SimulatedTransport implements FieldTransport {
  readonly endpoint: string
  private readonly random: () => number
  private readonly log: Logger
  private readonly blockSizes = new Map<number, number>()
  private opened = false

  constructor(
    private readonly devices: DeviceConfig[],
    options: SimulatedTransportOptions = {},
  ) {
    this.endpoint = options.endpoint ?? 'simulated://plc'
    this.random = options.random ?? Math.random
    this.log = options.logger ?? createLogger('simulated-transport')

    for (const { block } of devices) {
      const end = block.offset + block.size
      this.blockSizes.set(block.blockId, Math.max(this.blockSizes.get(block.blockId) ?? 0, end))
    }
  }

  async open(): Promise<void> {
    this.opened = true
    this.log.info({ endpoint: this.endpoint, blocks: [...this.blockSizes.keys()] }, 'simulated controller ready')
  }

  async close(): Promise<void> {
    this.opened = false
  }

  async isAlive(): Promise<boolean> {
    return this.opened
  }

  async readBlock(blockId: number, offset: number, size: number): Promise<Buffer> {
    if (!this.opened) throw new Error('Simulated controller is not open')

    const blockSize = this.blockSizes.get(blockId)
    if (blockSize === undefined) throw new DecodeError(`Block ${blockId} is not simulated`, { blockId })
    if (offset + size > blockSize) {
      throw new DecodeError(`Block ${blockId} holds ${blockSize} bytes, ${offset + size} requested`, { blockId })
    }

    const block = Buffer.alloc(blockSize)
    for (const device of this.devices) {
      if (device.block.blockId !== blockId) continue
      encodeBlock(device.block.size, device.fields, (name, type) => this.valueFor(name, type)).copy(
        block,
        device.block.offset,
      )
    }
    return block.subarray(offset, offset + size)
  }

  private valueFor(name: string, type: ScalarType): ReadingValue {
    if (type === 'Bool') {
      const onProbability = /Fault|Alarm/i.test(name) ? 0.02 : 0.95
      return this.random() < onProbability
    }

    const match = RAW_RANGES.find(([pattern]) => pattern.test(name))
    const [min, max] = match ? [match[1], match[2]] : DEFAULT_RANGE[type]
    const value = min + this.random() * (max - min)
    return type === 'Real' ? Math.round(value * 100) / 100 : Math.round(value)
  }
}
