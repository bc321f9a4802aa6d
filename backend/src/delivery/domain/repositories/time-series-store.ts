/* eslint-disable prettier/prettier */

import type { BatchPoint } from '../models/batch-point.js'

/**
 * @file time-series-store.ts
 * @description
 * Port of the durable time-series store.
 *
 * `writeBatch` must be idempotent by point identity (measurement, device,
 * module, time): replay may resend points that were already accepted.
 * Implementations throw on failure; the batch writer and the overflow
 * cache wrap calls with a timeout and classify the error.
 */
export interface TimeSeriesStore {
  writeBatch(points: BatchPoint[]): Promise<void>

  /** Cheap reachability check used before a replay pass. */
  ping(): Promise<boolean>
}
