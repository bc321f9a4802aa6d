/* eslint-disable prettier/prettier */

import type { Logger } from 'pino'

import type { Reading } from '../../acquisition/domain/models/reading.js'
import { withTimeout } from '../../common/app/policies/retry-policy.js'
import { describeError } from '../../common/domain/errors/app-error.js'
import { StoreWriteError } from '../../common/domain/errors/store-write-error.js'
import { createLogger } from '../../common/infrastructure/logger/index.js'
import { toBatchPoint, type BatchPoint } from '../domain/models/batch-point.js'
import type { TimeSeriesStore } from '../domain/repositories/time-series-store.js'
import type { OverflowCache } from './overflow-cache.js'

/**
 * @file batch-writer.ts
 * @description
 * Accumulates points across poll cycles and writes them to the store as
 * one batch.
 *
 * @remarks
 * A flush is due when any of these holds for a non-empty buffer:
 * - `batchCycles` poll cycles contributed to it
 * - the oldest buffered point is `maxAgeMs` old
 * - it holds `maxPoints` points
 *
 * `flushIfDue` runs from its own timer, never from the poll loop. The
 * buffer is swapped out synchronously before the write, so polling keeps
 * appending to a fresh buffer while the store call is in flight. A failed
 * batch is relocated into the overflow cache and the buffer stays cleared.
 */

export type BatchWriterOptions = {
  store: TimeSeriesStore
  overflow: OverflowCache
  batchCycles: number
  maxAgeMs: number
  maxPoints: number
  writeTimeoutMs: number
  /** Notified with the number of points accepted by the store. */
  onWritten?: (points: number) => void
  logger?: Logger
  now?: () => Date
}

export type FlushOutcome = 'empty' | 'written' | 'overflowed' | 'lost'

export type FlushReport = {
  outcome: FlushOutcome
  points: number
}

export type BatchWriterStats = {
  pendingPoints: number
  pendingCycles: number
  flushes: number
  failedFlushes: number
  writtenPoints: number
  overflowedPoints: number
  lostPoints: number
  lastFlushAt?: string
  lastFlushError?: string
}

export class BatchWriter {
  private readonly log: Logger
  private readonly now: () => Date

  private buffer: BatchPoint[] = []
  private cycles = 0
  private firstPointAt?: Date
  private flushing: Promise<FlushReport> | null = null

  private flushes = 0
  private failedFlushes = 0
  private writtenPoints = 0
  private overflowedPoints = 0
  private lostPoints = 0
  private lastFlushAt?: Date
  private lastFlushError?: string

  constructor(private readonly options: BatchWriterOptions) {
    this.log = options.logger ?? createLogger('batch-writer')
    this.now = options.now ?? (() => new Date())
  }

  append(reading: Reading): void {
    if (this.buffer.length === 0) this.firstPointAt = this.now()
    this.buffer.push(toBatchPoint(reading))
  }

  /** Counts one finished poll cycle toward the batch threshold. */
  markCycle(): void {
    if (this.buffer.length > 0) this.cycles++
  }

  isDue(now: Date = this.now()): boolean {
    if (this.buffer.length === 0) return false
    if (this.cycles >= this.options.batchCycles) return true
    if (this.buffer.length >= this.options.maxPoints) return true
    return this.firstPointAt !== undefined && now.getTime() - this.firstPointAt.getTime() >= this.options.maxAgeMs
  }

  async flushIfDue(now: Date = this.now()): Promise<FlushReport | null> {
    if (!this.isDue(now)) return null
    return this.flush()
  }

  /** Flushes whatever is buffered. A call during a running flush joins it. */
  flush(): Promise<FlushReport> {
    if (!this.flushing) {
      this.flushing = this.runFlush().finally(() => {
        this.flushing = null
      })
    }
    return this.flushing
  }

  getStats(): BatchWriterStats {
    return {
      pendingPoints: this.buffer.length,
      pendingCycles: this.cycles,
      flushes: this.flushes,
      failedFlushes: this.failedFlushes,
      writtenPoints: this.writtenPoints,
      overflowedPoints: this.overflowedPoints,
      lostPoints: this.lostPoints,
      lastFlushAt: this.lastFlushAt?.toISOString(),
      lastFlushError: this.lastFlushError,
    }
  }

  private async runFlush(): Promise<FlushReport> {
    const points = this.buffer
    const cycles = this.cycles
    this.buffer = []
    this.cycles = 0
    this.firstPointAt = undefined

    if (points.length === 0) return { outcome: 'empty', points: 0 }

    try {
      await withTimeout(this.options.store.writeBatch(points), this.options.writeTimeoutMs, 'store.writeBatch')
    } catch (cause) {
      return this.relocate(points, new StoreWriteError('Batch write failed', points.length, cause))
    }

    this.flushes++
    this.writtenPoints += points.length
    this.lastFlushAt = this.now()
    this.lastFlushError = undefined
    this.options.onWritten?.(points.length)
    this.log.info({ points: points.length, cycles }, 'batch written')
    return { outcome: 'written', points: points.length }
  }

  private async relocate(points: BatchPoint[], error: StoreWriteError): Promise<FlushReport> {
    this.failedFlushes++
    this.lastFlushError = describeError(error.cause ?? error)
    this.log.warn({ points: points.length, err: this.lastFlushError }, 'batch write failed, relocating to overflow')

    try {
      await this.options.overflow.enqueue(points)
      this.overflowedPoints += points.length
      return { outcome: 'overflowed', points: points.length }
    } catch (cause) {
      this.lostPoints += points.length
      this.log.error({ points: points.length, err: describeError(cause) }, 'overflow append failed, points lost')
      return { outcome: 'lost', points: points.length }
    }
  }
}
