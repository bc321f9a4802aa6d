/* eslint-disable prettier/prettier */

import type { DeviceLink } from '../../../acquisition/app/device-link.js'
import type { PollScheduler } from '../../../acquisition/app/poll-scheduler.js'
import type { BatchWriter, FlushReport } from '../../../delivery/app/batch-writer.js'
import type { OverflowCache } from '../../../delivery/app/overflow-cache.js'
import type { TimeSeriesStore } from '../../../delivery/domain/repositories/time-series-store.js'
import type { ThroughputCounter } from '../../../delivery/infrastructure/metrics/throughput-counter.js'
import type { BroadcastHub } from '../../../realtime/app/broadcast-hub.js'
import { describeError } from '../../domain/errors/app-error.js'
import { createLogger, type Logger } from '../../infrastructure/logger/index.js'
import { PeriodicTask, type PeriodicTaskStats } from '../tasks/periodic-task.js'

/**
 * @file pipeline-runtime.ts
 * @description
 * Owns the lifetime of the acquisition and delivery pipeline.
 *
 * `start()` brings the pieces up in dependency order and never fails on
 * an unreachable controller: the link repairs itself on the next poll.
 * `stop()` tears them down in the reverse order so the last readings are
 * flushed (or spilled to the overflow cache) before any data source
 * closes, and the controller session is released last.
 */

/** Anything holding an OS or network resource that must be released on shutdown. */
export type ClosableResource = {
  name: string
  close: () => Promise<void>
}

export type PipelineRuntimeOptions = {
  link: DeviceLink
  scheduler: PollScheduler
  batch: BatchWriter
  overflow: OverflowCache
  store: TimeSeriesStore
  hub: BroadcastHub
  throughput: ThroughputCounter
  flushCheckMs: number
  replayIntervalMs: number
  resources?: ClosableResource[]
  logger?: Logger
  now?: () => Date
}

export class PipelineRuntime {
  private readonly log: Logger
  private readonly now: () => Date
  private readonly flushTask: PeriodicTask
  private readonly replayTask: PeriodicTask

  private started = false
  private startedAt?: Date
  private stopping: Promise<void> | null = null

  constructor(private readonly options: PipelineRuntimeOptions) {
    this.log = options.logger ?? createLogger('pipeline')
    this.now = options.now ?? (() => new Date())

    this.flushTask = new PeriodicTask({
      name: 'flush-check',
      intervalMs: options.flushCheckMs,
      logger: this.log,
      run: async () => {
        const report = await options.batch.flushIfDue()
        if (report) this.recordFlush(report)
      },
    })

    this.replayTask = new PeriodicTask({
      name: 'overflow-replay',
      intervalMs: options.replayIntervalMs,
      logger: this.log,
      run: async () => {
        const report = await options.overflow.replay(options.store)
        if (report.replayed > 0) {
          options.throughput.record('replayed', report.replayed)
          this.log.info({ replayed: report.replayed, attempted: report.attempted, failed: report.failed }, 'overflow replayed')
        }
      },
    })
  }

  get isRunning(): boolean {
    return this.started && this.stopping === null
  }

  get startedAtIso(): string | undefined {
    return this.startedAt?.toISOString()
  }

  async start(): Promise<void> {
    if (this.started) return
    this.started = true
    this.startedAt = this.now()

    const connected = await this.options.link.connect()
    if (connected.ok) {
      this.log.info({ endpoint: connected.value.endpoint }, 'controller connected')
    } else {
      this.log.warn({ endpoint: this.options.link.endpoint, err: describeError(connected.error) }, 'controller unreachable at startup, running degraded')
    }

    this.options.hub.start()
    this.options.scheduler.start()
    this.flushTask.start()
    this.replayTask.start()

    this.log.info({ flushCheckMs: this.options.flushCheckMs, replayIntervalMs: this.options.replayIntervalMs }, 'pipeline started')
  }

  /** Idempotent; concurrent calls share the same shutdown. */
  stop(): Promise<void> {
    if (!this.started) return Promise.resolve()
    this.stopping ??= this.shutdown()
    return this.stopping
  }

  getTasks(): PeriodicTaskStats[] {
    return [this.flushTask.getStats(), this.replayTask.getStats()]
  }

  private async shutdown(): Promise<void> {
    this.log.info('pipeline stopping')

    await this.options.hub.stop()
    await this.options.scheduler.stop()

    const report = await this.options.batch.flush()
    this.recordFlush(report)
    this.log.info({ outcome: report.outcome, points: report.points }, 'final flush')

    await this.flushTask.stop()
    await this.replayTask.stop()

    for (const resource of this.options.resources ?? []) {
      try {
        await resource.close()
        this.log.debug({ resource: resource.name }, 'resource closed')
      } catch (err) {
        this.log.error({ resource: resource.name, err: describeError(err) }, 'resource close failed')
      }
    }

    await this.options.link.disconnect()
    this.log.info('pipeline stopped')
  }

  private recordFlush(report: FlushReport): void {
    if (report.outcome === 'overflowed') this.options.throughput.record('overflowed', report.points)
    if (report.outcome === 'lost') this.options.throughput.record('lost', report.points)
  }
}
