/* eslint-disable prettier/prettier */

import { inject, injectable } from 'tsyringe'

import type { ReadingJSON } from '../../../acquisition/domain/models/reading.js'
import { NotFoundError } from '../../../common/domain/errors/not-found-error.js'
import { SnapshotStore } from '../snapshot-store.js'

export type GetDeviceReadingInput = {
  deviceId: string
}

/**
 * Latest Reading of one device.
 * @throws NotFoundError when the device has not produced a Reading yet.
 */
@injectable()
export class GetDeviceReadingUseCase {
  constructor(@inject('SnapshotStore') private readonly snapshot: SnapshotStore) {}

  async execute({ deviceId }: GetDeviceReadingInput): Promise<ReadingJSON> {
    const reading = this.snapshot.get(deviceId)
    if (!reading) throw new NotFoundError('No reading for device', { deviceId })
    return reading.toJSON()
  }
}
