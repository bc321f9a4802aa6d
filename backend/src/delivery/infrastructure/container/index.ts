/* eslint-disable prettier/prettier */

/**
 * @file index.ts
 * @description
 * DI bindings of the **Delivery** module (`tsyringe`).
 *
 * | Token                       | Implementation                         | Lifetime  |
 * |-----------------------------|----------------------------------------|-----------|
 * | `'DataSource'`              | PostgreSQL `dataSource`                | Instance  |
 * | `'OverflowDataSource'`      | SQLite DataSource at `OVERFLOW_DB_PATH` | Singleton |
 * | `'TimeSeriesStore'`         | `SensorDataTypeormRepository`          | Singleton |
 * | `'OverflowRepository'`      | `OverflowTypeormRepository`            | Singleton |
 * | `'SnapshotStore'`           | `SnapshotStore`                        | Singleton |
 * | `'ThroughputCounter'`       | `ThroughputCounter`                    | Singleton |
 * | `'OverflowCache'`           | `OverflowCache`                        | Singleton |
 * | `'BatchWriter'`             | `BatchWriter`                          | Singleton |
 * | `'GetLatestReadingsUseCase'`| `GetLatestReadingsUseCase`             | Factory   |
 * | `'GetDeviceReadingUseCase'` | `GetDeviceReadingUseCase`              | Factory   |
 */

import { container, instanceCachingFactory } from 'tsyringe'
import type { DataSource } from 'typeorm'
import { env } from '../../../common/infrastructure/env/index.js'
import { dataSource } from '../../../common/infrastructure/typeorm/index.js'
import { BatchWriter } from '../../app/batch-writer.js'
import { OverflowCache } from '../../app/overflow-cache.js'
import { SnapshotStore } from '../../app/snapshot-store.js'
import { GetDeviceReadingUseCase } from '../../app/usecases/get-device-reading.usecase.js'
import { GetLatestReadingsUseCase } from '../../app/usecases/get-latest-readings.usecase.js'
import type { OverflowRepository } from '../../domain/repositories/overflow-repository.js'
import type { TimeSeriesStore } from '../../domain/repositories/time-series-store.js'
import { ThroughputCounter } from '../metrics/throughput-counter.js'
import { createOverflowDataSource } from '../typeorm/overflow-data-source.js'
import { OverflowTypeormRepository } from '../typeorm/repositories/overflow-typeorm.repository.js'
import { SensorDataTypeormRepository } from '../typeorm/repositories/sensor-data-typeorm.repository.js'

const DAY_MS = 24 * 60 * 60 * 1000

container.registerInstance('DataSource', dataSource)
container.register<DataSource>('OverflowDataSource', {
  useFactory: instanceCachingFactory<DataSource>(() => createOverflowDataSource(env.OVERFLOW_DB_PATH)),
})

container.registerSingleton<TimeSeriesStore>('TimeSeriesStore', SensorDataTypeormRepository)
container.registerSingleton<OverflowRepository>('OverflowRepository', OverflowTypeormRepository)

container.registerSingleton('SnapshotStore', SnapshotStore)

container.register<ThroughputCounter>('ThroughputCounter', {
  useFactory: instanceCachingFactory<ThroughputCounter>(() => new ThroughputCounter()),
})

container.register<OverflowCache>('OverflowCache', {
  useFactory: instanceCachingFactory<OverflowCache>(
    (c) =>
      new OverflowCache({
        repository: c.resolve<OverflowRepository>('OverflowRepository'),
        maxRecords: env.OVERFLOW_MAX_RECORDS,
        evictionPolicy: env.OVERFLOW_EVICTION_POLICY,
        replayBatchSize: env.REPLAY_BATCH_SIZE,
        writeTimeoutMs: env.STORE_WRITE_TIMEOUT_MS,
        retentionMs: env.OVERFLOW_RETENTION_DAYS * DAY_MS,
      }),
  ),
})

container.register<BatchWriter>('BatchWriter', {
  useFactory: instanceCachingFactory<BatchWriter>((c) => {
    const throughput = c.resolve<ThroughputCounter>('ThroughputCounter')
    return new BatchWriter({
      store: c.resolve<TimeSeriesStore>('TimeSeriesStore'),
      overflow: c.resolve<OverflowCache>('OverflowCache'),
      batchCycles: env.BATCH_CYCLES,
      maxAgeMs: env.BATCH_MAX_AGE_MS,
      maxPoints: env.BATCH_MAX_POINTS,
      writeTimeoutMs: env.STORE_WRITE_TIMEOUT_MS,
      onWritten: (points) => throughput.record('written', points),
    })
  }),
})

container.register('GetLatestReadingsUseCase', {
  useFactory: (c) => new GetLatestReadingsUseCase(c.resolve('SnapshotStore')),
})

container.register('GetDeviceReadingUseCase', {
  useFactory: (c) => new GetDeviceReadingUseCase(c.resolve('SnapshotStore')),
})
