/* eslint-disable prettier/prettier */

/**
 * @file reading.ts
 * @description
 * One decoded and converted value set for one device at one instant.
 *
 * A Reading is produced by a poll cycle, stored in the snapshot and
 * appended to the pending batch. It is frozen at construction: the same
 * instance is shared by the snapshot, the batch writer and the realtime
 * push, so nobody may mutate it.
 */

export type ReadingValue = number | boolean

export type ReadingProps = {
  deviceId: string
  deviceType: string
  moduleType: string
  moduleTag: string
  blockId: number
  timestamp: Date
  values: Record<string, ReadingValue>
}

export type ReadingJSON = Omit<ReadingProps, 'timestamp'> & { timestamp: string }

export class Reading {
  public readonly deviceId: string
  public readonly deviceType: string
  public readonly moduleType: string
  /** Human label of the module inside the device (e.g. `zone_3_temp`). */
  public readonly moduleTag: string
  public readonly blockId: number
  public readonly timestamp: Date
  public readonly values: Readonly<Record<string, ReadingValue>>

  constructor(props: ReadingProps) {
    this.deviceId = props.deviceId
    this.deviceType = props.deviceType
    this.moduleType = props.moduleType
    this.moduleTag = props.moduleTag
    this.blockId = props.blockId
    this.timestamp = new Date(props.timestamp.getTime())
    this.values = Object.freeze({ ...props.values })
    Object.freeze(this)
  }

  isNewerThan(other: Reading): boolean {
    return this.timestamp.getTime() > other.timestamp.getTime()
  }

  toJSON(): ReadingJSON {
    return {
      deviceId: this.deviceId,
      deviceType: this.deviceType,
      moduleType: this.moduleType,
      moduleTag: this.moduleTag,
      blockId: this.blockId,
      timestamp: this.timestamp.toISOString(),
      values: { ...this.values },
    }
  }
}
