/* eslint-disable prettier/prettier */

import type { Logger } from 'pino'

import { PeriodicTask, type PeriodicTaskStats } from '../../common/app/tasks/periodic-task.js'
import { describeError } from '../../common/domain/errors/app-error.js'
import { DecodeError } from '../../common/domain/errors/decode-error.js'
import { createLogger } from '../../common/infrastructure/logger/index.js'
import type { BatchWriter } from '../../delivery/app/batch-writer.js'
import type { SnapshotStore } from '../../delivery/app/snapshot-store.js'
import { convertValues } from '../domain/converters/index.js'
import { decodeBlock } from '../domain/decoding/block-decoder.js'
import type { DeviceConfig } from '../domain/models/device-config.js'
import { Reading } from '../domain/models/reading.js'
import type { DeviceLink } from './device-link.js'

/**
 * @file poll-scheduler.ts
 * @description
 * Drives one sampling cycle per interval over every configured device.
 *
 * @remarks
 * For each device, in configuration order:
 * `readBlock` → `decodeBlock` → `convertValues` → Reading.
 * Converters get the device's previous Reading from the snapshot, which
 * rate values such as a hopper's feed rate are derived from.
 *
 * A Reading goes to the snapshot first and then to the pending batch, so
 * live subscribers never lag behind storage. A failing device is logged
 * and skipped; the cycle carries on with the next one. A cycle in which
 * every device failed is reported as `total` and does not throw.
 */

export type PollOutcome = 'success' | 'partial' | 'total'

export type PollStage = 'read' | 'decode' | 'convert'

export type DeviceFailure = {
  deviceId: string
  stage: PollStage
  error: string
}

export type PollCycleReport = {
  outcome: PollOutcome
  startedAt: Date
  durationMs: number
  readings: number
  failures: DeviceFailure[]
}

export type PollSchedulerStats = {
  cycles: number
  outcomes: Record<PollOutcome, number>
  lastOutcome?: PollOutcome
  lastCycleAt?: string
  lastCycleMs?: number
  lastFailures: DeviceFailure[]
  task: PeriodicTaskStats
}

export type PollSchedulerOptions = {
  link: DeviceLink
  devices: DeviceConfig[]
  snapshot: SnapshotStore
  batch: BatchWriter
  intervalMs: number
  logger?: Logger
  now?: () => Date
}

class DeviceStageError extends Error {
  constructor(
    readonly stage: PollStage,
    readonly detail: string,
  ) {
    super(detail)
  }
}

function atStage<T>(stage: PollStage, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    throw new DeviceStageError(stage, describeError(error))
  }
}

export class PollScheduler {
  private readonly log: Logger
  private readonly now: () => Date
  private readonly task: PeriodicTask

  private cycles = 0
  private readonly outcomes: Record<PollOutcome, number> = { success: 0, partial: 0, total: 0 }
  private last?: PollCycleReport

  constructor(private readonly options: PollSchedulerOptions) {
    this.log = options.logger ?? createLogger('poll-scheduler')
    this.now = options.now ?? (() => new Date())
    this.task = new PeriodicTask({
      name: 'poll',
      intervalMs: options.intervalMs,
      runImmediately: true,
      logger: this.log,
      run: async () => {
        await this.runCycle()
      },
    })
  }

  start(): void {
    this.task.start()
    this.log.info({ devices: this.options.devices.length, intervalMs: this.options.intervalMs }, 'polling started')
  }

  /** Stops scheduling and waits for the cycle in flight. */
  async stop(): Promise<void> {
    await this.task.stop()
    this.log.info({ cycles: this.cycles }, 'polling stopped')
  }

  async runCycle(): Promise<PollCycleReport> {
    const startedAt = this.now()
    const failures: DeviceFailure[] = []
    let readings = 0

    for (const device of this.options.devices) {
      try {
        const reading = await this.sample(device)
        this.options.snapshot.update(device.deviceId, reading)
        this.options.batch.append(reading)
        readings++
      } catch (error) {
        const failure: DeviceFailure =
          error instanceof DeviceStageError
            ? { deviceId: device.deviceId, stage: error.stage, error: error.detail }
            : { deviceId: device.deviceId, stage: 'convert', error: describeError(error) }
        failures.push(failure)
        this.log.warn(failure, 'device skipped this cycle')
      }
    }

    this.options.batch.markCycle()

    const outcome: PollOutcome = readings === 0 ? 'total' : failures.length > 0 ? 'partial' : 'success'
    const report: PollCycleReport = {
      outcome,
      startedAt,
      durationMs: this.now().getTime() - startedAt.getTime(),
      readings,
      failures,
    }

    this.cycles++
    this.outcomes[outcome]++
    this.last = report

    if (outcome === 'success') {
      this.log.debug({ readings, durationMs: report.durationMs }, 'poll cycle complete')
    } else {
      this.log.warn({ outcome, readings, failed: failures.length }, 'poll cycle degraded')
    }
    return report
  }

  getStats(): PollSchedulerStats {
    return {
      cycles: this.cycles,
      outcomes: { ...this.outcomes },
      lastOutcome: this.last?.outcome,
      lastCycleAt: this.last?.startedAt.toISOString(),
      lastCycleMs: this.last?.durationMs,
      lastFailures: this.last ? [...this.last.failures] : [],
      task: this.task.getStats(),
    }
  }

  private async sample(device: DeviceConfig): Promise<Reading> {
    const { blockId, offset, size } = device.block

    const read = await this.options.link.readBlock(blockId, offset, size)
    if (!read.ok) {
      throw new DeviceStageError(read.error instanceof DecodeError ? 'decode' : 'read', describeError(read.error))
    }

    const at = this.now()
    const last = this.options.snapshot.get(device.deviceId)
    const previous = last
      ? { values: last.values, elapsedSeconds: (at.getTime() - last.timestamp.getTime()) / 1000 }
      : undefined

    const raw = atStage('decode', () => decodeBlock(read.value, device.fields))
    const values = atStage('convert', () =>
      convertValues(device.moduleType, raw, { currentRatio: device.currentRatio, previous }),
    )

    return new Reading({
      deviceId: device.deviceId,
      deviceType: device.deviceType,
      moduleType: device.moduleType,
      moduleTag: device.moduleTag,
      blockId,
      timestamp: at,
      values,
    })
  }
}
