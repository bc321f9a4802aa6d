/* eslint-disable prettier/prettier */

import type { Logger } from 'pino'

import { withTimeout } from '../../common/app/policies/retry-policy.js'
import { describeError } from '../../common/domain/errors/app-error.js'
import { createLogger } from '../../common/infrastructure/logger/index.js'
import type { BatchPoint } from '../domain/models/batch-point.js'
import type { EvictionPolicy, EvictionReason } from '../domain/models/overflow-record.js'
import type { OverflowRepository } from '../domain/repositories/overflow-repository.js'
import type { TimeSeriesStore } from '../domain/repositories/time-series-store.js'

/**
 * @file overflow-cache.ts
 * @description
 * Durable FIFO of points the store refused, replayed automatically once
 * the store answers again.
 *
 * @remarks
 * **Ordering.** Records are replayed by ascending `seq`, one global FIFO.
 * A replay pass writes chunks of `replayBatchSize`; the first chunk that
 * fails ends the pass, so nothing queued behind a failed record reaches
 * the store before it.
 *
 * **Capacity.** After every append the queue is trimmed back to
 * `maxRecords` according to `evictionPolicy`:
 * - `drop-oldest`: the lowest seqs go first (default)
 * - `drop-newest`: the records just appended go first
 *
 * Evictions and retention purges are counted and logged as data loss.
 */

export type OverflowCacheOptions = {
  repository: OverflowRepository
  maxRecords: number
  evictionPolicy: EvictionPolicy
  replayBatchSize: number
  writeTimeoutMs: number
  /** Records older than this are purged before each replay pass. */
  retentionMs: number
  logger?: Logger
  now?: () => Date
}

export type ReplayReport = {
  attempted: number
  replayed: number
  failed: boolean
  skipped?: 'busy' | 'empty' | 'store-unreachable'
}

export type OverflowStats = {
  depth: number
  evictionPolicy: EvictionPolicy
  evicted: Record<EvictionReason, number>
  replayed: number
  replayFailures: number
  lastReplayAt?: string
  lastReplayError?: string
}

export class OverflowCache {
  private readonly repository: OverflowRepository
  private readonly log: Logger
  private readonly now: () => Date

  private replaying = false
  private readonly evicted: Record<EvictionReason, number> = { capacity: 0, retention: 0 }
  private replayed = 0
  private replayFailures = 0
  private lastReplayAt?: Date
  private lastReplayError?: string

  constructor(private readonly options: OverflowCacheOptions) {
    if (options.replayBatchSize < 1) throw new RangeError('replayBatchSize must be >= 1')
    if (options.maxRecords < 1) throw new RangeError('maxRecords must be >= 1')
    this.repository = options.repository
    this.log = options.logger ?? createLogger('overflow-cache')
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Durably appends one record per point, then enforces capacity.
   * Throws when the append itself fails; the caller accounts for the loss.
   */
  async enqueue(points: BatchPoint[]): Promise<void> {
    if (points.length === 0) return

    await withTimeout(this.repository.append(points, this.now()), this.options.writeTimeoutMs, 'overflow.append')
    this.log.info({ points: points.length }, 'points moved to overflow cache')

    await this.enforceCapacity()
  }

  async depth(): Promise<number> {
    return this.repository.count()
  }

  /**
   * One replay pass against `store`. Never throws for store errors; they
   * end the pass and leave the records for the next one.
   */
  async replay(store: TimeSeriesStore): Promise<ReplayReport> {
    if (this.replaying) return { attempted: 0, replayed: 0, failed: false, skipped: 'busy' }
    this.replaying = true

    try {
      await this.purgeExpired()

      if ((await this.repository.count()) === 0) {
        return { attempted: 0, replayed: 0, failed: false, skipped: 'empty' }
      }
      if (!(await this.isReachable(store))) {
        this.log.debug('store unreachable, replay pass skipped')
        return { attempted: 0, replayed: 0, failed: false, skipped: 'store-unreachable' }
      }

      return await this.drain(store)
    } finally {
      this.replaying = false
    }
  }

  async getStats(): Promise<OverflowStats> {
    return {
      depth: await this.repository.count(),
      evictionPolicy: this.options.evictionPolicy,
      evicted: { ...this.evicted },
      replayed: this.replayed,
      replayFailures: this.replayFailures,
      lastReplayAt: this.lastReplayAt?.toISOString(),
      lastReplayError: this.lastReplayError,
    }
  }

  get evictedTotal(): number {
    return this.evicted.capacity + this.evicted.retention
  }

  private async drain(store: TimeSeriesStore): Promise<ReplayReport> {
    let attempted = 0
    let replayed = 0
    let lastSeq = -Infinity

    for (;;) {
      const records = await this.repository.oldest(this.options.replayBatchSize)
      if (records.length === 0 || records[0].seq <= lastSeq) break

      const seqs = records.map((r) => r.seq)
      attempted += records.length

      try {
        await withTimeout(
          store.writeBatch(records.map((r) => r.point)),
          this.options.writeTimeoutMs,
          'replay.writeBatch',
        )
      } catch (cause) {
        await this.repository.incrementAttempts(seqs)
        this.replayFailures++
        this.lastReplayError = describeError(cause)
        this.log.warn({ fromSeq: seqs[0], records: seqs.length, err: this.lastReplayError }, 'replay pass stopped at failed chunk')
        return { attempted, replayed, failed: true }
      }

      await this.repository.delete(seqs)
      replayed += records.length
      this.replayed += records.length
      lastSeq = seqs[seqs.length - 1]
    }

    this.lastReplayAt = this.now()
    this.lastReplayError = undefined
    this.log.info({ replayed }, 'overflow replay pass complete')
    return { attempted, replayed, failed: false }
  }

  private async enforceCapacity(): Promise<void> {
    const excess = (await this.repository.count()) - this.options.maxRecords
    if (excess <= 0) return

    const removed =
      this.options.evictionPolicy === 'drop-oldest'
        ? await this.repository.evictOldest(excess)
        : await this.repository.evictNewest(excess)

    this.recordEviction('capacity', removed)
  }

  private async purgeExpired(): Promise<void> {
    const cutoff = new Date(this.now().getTime() - this.options.retentionMs)
    const removed = await this.repository.deleteEnqueuedBefore(cutoff)
    this.recordEviction('retention', removed)
  }

  private recordEviction(reason: EvictionReason, removed: number): void {
    if (removed <= 0) return
    this.evicted[reason] += removed
    this.log.warn(
      { reason, removed, policy: this.options.evictionPolicy, evictedTotal: this.evictedTotal },
      'overflow records evicted (data loss)',
    )
  }

  private async isReachable(store: TimeSeriesStore): Promise<boolean> {
    try {
      return await withTimeout(store.ping(), this.options.writeTimeoutMs, 'store.ping')
    } catch (cause) {
      this.lastReplayError = describeError(cause)
      return false
    }
  }
}
