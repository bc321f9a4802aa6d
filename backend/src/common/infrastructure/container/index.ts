/* eslint-disable prettier/prettier */
import { container, instanceCachingFactory } from 'tsyringe'
import type { DataSource } from 'typeorm'

import { env } from '../env/index.js'
import { PipelineRuntime } from '../../app/launchers/pipeline-runtime.js'
import { GetPipelineStatusUseCase } from '../../app/usecases/get-pipeline-status.usecase.js'

// Each import registers the bindings of one module
import '../../../acquisition/infrastructure/container/index.js'
import '../../../delivery/infrastructure/container/index.js'
import '../../../realtime/infrastructure/container/index.js'

import type { DeviceLink } from '../../../acquisition/app/device-link.js'
import type { PollScheduler } from '../../../acquisition/app/poll-scheduler.js'
import type { BatchWriter } from '../../../delivery/app/batch-writer.js'
import type { OverflowCache } from '../../../delivery/app/overflow-cache.js'
import type { OverflowRepository } from '../../../delivery/domain/repositories/overflow-repository.js'
import type { TimeSeriesStore } from '../../../delivery/domain/repositories/time-series-store.js'
import type { ThroughputCounter } from '../../../delivery/infrastructure/metrics/throughput-counter.js'
import type { BroadcastHub } from '../../../realtime/app/broadcast-hub.js'

/**
 * @file index.ts
 * @description
 * Root of the dependency graph (`tsyringe`).
 *
 * Loads the bindings of every module, then wires the pipeline runtime
 * that owns their lifetimes. Everything is created lazily on first
 * `resolve`, so importing this file only reads configuration.
 */

container.register<PipelineRuntime>('PipelineRuntime', {
  useFactory: instanceCachingFactory<PipelineRuntime>((c) => {
    const overflowRepository = c.resolve<OverflowRepository>('OverflowRepository')
    const postgres = c.resolve<DataSource>('DataSource')

    return new PipelineRuntime({
      link: c.resolve<DeviceLink>('DeviceLink'),
      scheduler: c.resolve<PollScheduler>('PollScheduler'),
      batch: c.resolve<BatchWriter>('BatchWriter'),
      overflow: c.resolve<OverflowCache>('OverflowCache'),
      store: c.resolve<TimeSeriesStore>('TimeSeriesStore'),
      hub: c.resolve<BroadcastHub>('BroadcastHub'),
      throughput: c.resolve<ThroughputCounter>('ThroughputCounter'),
      flushCheckMs: env.BATCH_FLUSH_CHECK_MS,
      replayIntervalMs: env.REPLAY_INTERVAL_MS,
      resources: [
        { name: 'overflow-cache', close: () => overflowRepository.close() },
        {
          name: 'postgres',
          close: async () => {
            if (postgres.isInitialized) await postgres.destroy()
          },
        },
      ],
    })
  }),
})

container.registerSingleton('GetPipelineStatusUseCase', GetPipelineStatusUseCase)
