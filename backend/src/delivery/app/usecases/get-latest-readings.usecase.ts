/* eslint-disable prettier/prettier */

import { inject, injectable } from 'tsyringe'

import type { ReadingJSON } from '../../../acquisition/domain/models/reading.js'
import { SnapshotStore } from '../snapshot-store.js'

/**
 * @file get-latest-readings.usecase.ts
 * @description
 * Latest Reading of every device, as held by the snapshot store.
 * Same payload as the `data` of a realtime push, for clients that poll.
 */

export type LatestReadings = {
  timestamp: string
  count: number
  devices: Record<string, ReadingJSON>
}

@injectable()
export class GetLatestReadingsUseCase {
  constructor(@inject('SnapshotStore') private readonly snapshot: SnapshotStore) {}

  async execute(): Promise<LatestReadings> {
    const devices = this.snapshot.toJSON()
    return {
      timestamp: new Date().toISOString(),
      count: Object.keys(devices).length,
      devices,
    }
  }
}
