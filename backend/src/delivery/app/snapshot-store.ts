/* eslint-disable prettier/prettier */

import type { Reading, ReadingJSON } from '../../acquisition/domain/models/reading.js'

/**
 * @file snapshot-store.ts
 * @description
 * Latest Reading per device, in memory only.
 *
 * @remarks
 * Written by the poll scheduler, read by the broadcast hub and the HTTP
 * layer. Every operation is synchronous, so on the event loop each one is
 * its own critical section: no reader can observe a half-applied update,
 * and `getAll()` hands out a copy that later updates do not touch.
 *
 * Freshness is monotonic per device: a Reading older than the stored one
 * is refused.
 */
export class SnapshotStore {
  private readonly latest = new Map<string, Reading>()
  private rejected = 0

  /**
   * Replaces the stored Reading for `deviceId`.
   * @returns false when `reading` is older than what is already stored.
   */
  update(deviceId: string, reading: Reading): boolean {
    const current = this.latest.get(deviceId)
    if (current && current.isNewerThan(reading)) {
      this.rejected++
      return false
    }
    this.latest.set(deviceId, reading)
    return true
  }

  get(deviceId: string): Reading | undefined {
    return this.latest.get(deviceId)
  }

  /** Point-in-time copy keyed by device id. */
  getAll(): Record<string, Reading> {
    return Object.fromEntries(this.latest)
  }

  toJSON(): Record<string, ReadingJSON> {
    const out: Record<string, ReadingJSON> = {}
    for (const [deviceId, reading] of this.latest) out[deviceId] = reading.toJSON()
    return out
  }

  get size(): number {
    return this.latest.size
  }

  /** Updates refused because they were older than the stored Reading. */
  get rejectedUpdates(): number {
    return this.rejected
  }
}
