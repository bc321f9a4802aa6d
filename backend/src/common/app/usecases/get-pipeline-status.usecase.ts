/* eslint-disable prettier/prettier */

import { inject, injectable } from 'tsyringe'

import { DeviceLink } from '../../../acquisition/app/device-link.js'
import { PollScheduler, type PollSchedulerStats } from '../../../acquisition/app/poll-scheduler.js'
import type { DeviceLinkStatusProps, LinkHealth } from '../../../acquisition/domain/models/device-link-status.js'
import { BatchWriter, type BatchWriterStats } from '../../../delivery/app/batch-writer.js'
import { OverflowCache, type OverflowStats } from '../../../delivery/app/overflow-cache.js'
import { SnapshotStore } from '../../../delivery/app/snapshot-store.js'
import { ThroughputCounter, type ThroughputSnapshot } from '../../../delivery/infrastructure/metrics/throughput-counter.js'
import { BroadcastHub, type BroadcastHubStats } from '../../../realtime/app/broadcast-hub.js'
import type { FeedSource } from '../../../realtime/domain/models/messages.js'
import type { PeriodicTaskStats } from '../tasks/periodic-task.js'
import { PipelineRuntime } from '../launchers/pipeline-runtime.js'

/**
 * @file get-pipeline-status.usecase.ts
 * @description
 * Consolidated view of the pipeline for operators, served by `GET /api/status`.
 *
 * @remarks
 * The verdict is `degraded` whenever data is not reaching the store on the
 * normal path: the controller link is not healthy, or points are waiting
 * in the overflow cache.
 */

export type PipelineStatus = {
  status: 'ok' | 'degraded'
  mode: FeedSource
  running: boolean
  startedAt?: string
  timestamp: string
  device: DeviceLinkStatusProps & { health: LinkHealth }
  polling: PollSchedulerStats
  batch: BatchWriterStats
  overflow: OverflowStats
  realtime: BroadcastHubStats
  snapshot: { devices: number; rejectedUpdates: number }
  throughput: ThroughputSnapshot
  tasks: PeriodicTaskStats[]
}

@injectable()
export class GetPipelineStatusUseCase {
  constructor(
    @inject('PipelineRuntime') private readonly runtime: PipelineRuntime,
    @inject('DeviceLink') private readonly link: DeviceLink,
    @inject('PollScheduler') private readonly scheduler: PollScheduler,
    @inject('BatchWriter') private readonly batch: BatchWriter,
    @inject('OverflowCache') private readonly overflow: OverflowCache,
    @inject('BroadcastHub') private readonly hub: BroadcastHub,
    @inject('SnapshotStore') private readonly snapshot: SnapshotStore,
    @inject('ThroughputCounter') private readonly throughput: ThroughputCounter,
    @inject('FeedSource') private readonly mode: FeedSource,
  ) {}

  async execute(): Promise<PipelineStatus> {
    const device = this.link.getStatus().toJSON()
    const overflow = await this.overflow.getStats()
    const degraded = device.health !== 'healthy' || overflow.depth > 0

    return {
      status: degraded ? 'degraded' : 'ok',
      mode: this.mode,
      running: this.runtime.isRunning,
      startedAt: this.runtime.startedAtIso,
      timestamp: new Date().toISOString(),
      device,
      polling: this.scheduler.getStats(),
      batch: this.batch.getStats(),
      overflow,
      realtime: this.hub.getStats(),
      snapshot: { devices: this.snapshot.size, rejectedUpdates: this.snapshot.rejectedUpdates },
      throughput: this.throughput.snapshot(),
      tasks: this.runtime.getTasks(),
    }
  }
}
