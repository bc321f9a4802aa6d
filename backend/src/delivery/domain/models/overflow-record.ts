/* eslint-disable prettier/prettier */

import type { BatchPoint } from './batch-point.js'

/**
 * A BatchPoint that failed to reach the store, persisted for replay.
 * `seq` is assigned by the durable queue and defines replay order.
 */
export type OverflowRecord = {
  seq: number
  point: BatchPoint
  enqueuedAt: Date
  attempts: number
}

export type EvictionPolicy = 'drop-oldest' | 'drop-newest'

export type EvictionReason = 'capacity' | 'retention'
