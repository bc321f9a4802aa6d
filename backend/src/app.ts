/* eslint-disable prettier/prettier */
import { container } from 'tsyringe'
import type { DataSource } from 'typeorm'

import './common/infrastructure/container/index.js'
import type { DeviceConfig } from './acquisition/domain/models/device-config.js'
import type { PipelineRuntime } from './common/app/launchers/pipeline-runtime.js'
import { describeError } from './common/domain/errors/app-error.js'
import { env } from './common/infrastructure/env/index.js'
import { closeHttpServer, startHttpServer } from './common/infrastructure/http/server.js'
import { createLogger } from './common/infrastructure/logger/index.js'
import type { BroadcastHub } from './realtime/app/broadcast-hub.js'
import { attachRealtimeGateway } from './realtime/infrastructure/ws/ws-gateway.js'

/**
 * @file app.ts
 * @description
 * Application bootstrap:
 * - loads the device configuration (fatal if invalid)
 * - opens the local overflow cache (fatal if it cannot be opened)
 * - opens PostgreSQL and applies migrations (degraded if unreachable)
 * - starts the pipeline, the HTTP API and the realtime websocket
 *
 * An unreachable controller or database never stops the process; the
 * pipeline keeps retrying and the status endpoint reports `degraded`.
 */

const log = createLogger('app')

export type RunningApp = {
  stop(): Promise<void>
}

export async function startApp(): Promise<RunningApp> {
  log.info({ mode: env.MOCK_MODE ? 'mock' : 'plc', port: env.PORT }, 'starting')

  const devices = container.resolve<DeviceConfig[]>('Devices')
  log.info({ devices: devices.length, path: env.DEVICES_CONFIG_PATH }, 'device configuration loaded')

  await container.resolve<DataSource>('OverflowDataSource').initialize()
  log.info({ path: env.OVERFLOW_DB_PATH }, 'overflow cache opened')

  const postgres = container.resolve<DataSource>('DataSource')
  try {
    await postgres.initialize()
    log.info({ host: env.DB_HOST, database: env.DB_NAME }, 'time-series store ready')
  } catch (err) {
    log.warn(
      { host: env.DB_HOST, database: env.DB_NAME, err: describeError(err) },
      'time-series store unreachable at startup; batches go to the overflow cache until it returns',
    )
  }

  const runtime = container.resolve<PipelineRuntime>('PipelineRuntime')
  await runtime.start()

  const server = await startHttpServer(env.PORT)
  const gateway = attachRealtimeGateway(server, container.resolve<BroadcastHub>('BroadcastHub'))

  let stopping: Promise<void> | null = null

  return {
    stop() {
      stopping ??= (async () => {
        await runtime.stop()
        await gateway.close()
        await closeHttpServer(server)
        log.info('stopped')
      })()
      return stopping
    },
  }
}
