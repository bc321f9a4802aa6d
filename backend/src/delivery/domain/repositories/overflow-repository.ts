/* eslint-disable prettier/prettier */

import type { BatchPoint } from '../models/batch-point.js'
import type { OverflowRecord } from '../models/overflow-record.js'

/**
 * @file overflow-repository.ts
 * @description
 * Durable append-only queue behind the overflow cache. Order is the
 * insertion order (`seq` ascending) and must survive a restart.
 */
export interface OverflowRepository {
  /** Appends one record per point, all stamped with `enqueuedAt`. */
  append(points: BatchPoint[], enqueuedAt: Date): Promise<void>

  /** Oldest `limit` records, `seq` ascending. */
  oldest(limit: number): Promise<OverflowRecord[]>

  delete(seqs: number[]): Promise<void>

  incrementAttempts(seqs: number[]): Promise<void>

  count(): Promise<number>

  /** Deletes the `n` lowest seqs. Returns how many were removed. */
  evictOldest(n: number): Promise<number>

  /** Deletes the `n` highest seqs. Returns how many were removed. */
  evictNewest(n: number): Promise<number>

  /** Deletes records enqueued before `cutoff`. Returns how many were removed. */
  deleteEnqueuedBefore(cutoff: Date): Promise<number>

  close(): Promise<void>
}
