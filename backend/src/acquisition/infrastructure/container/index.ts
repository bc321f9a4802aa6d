/* eslint-disable prettier/prettier */

/**
 * @file index.ts
 * @description
 * DI bindings of the **Acquisition** module (`tsyringe`).
 *
 * | Token             | Implementation                                   | Lifetime  |
 * |-------------------|--------------------------------------------------|-----------|
 * | `'Devices'`       | `loadDevicesConfig(DEVICES_CONFIG_PATH)`         | Singleton |
 * | `'FieldTransport'`| `OpcuaBlockTransport`, or `SimulatedTransport` in mock mode | Singleton |
 * | `'DeviceLink'`    | `DeviceLink`                                     | Singleton |
 * | `'PollScheduler'` | `PollScheduler`                                  | Singleton |
 *
 * An invalid device file throws `ConfigurationError` on the first
 * resolve of `'Devices'`, which the bootstrap does before anything else.
 */

import { container, instanceCachingFactory } from 'tsyringe'
import { env } from '../../../common/infrastructure/env/index.js'
import { createRetryPolicy } from '../../../common/app/policies/retry-policy.js'
import type { BatchWriter } from '../../../delivery/app/batch-writer.js'
import type { SnapshotStore } from '../../../delivery/app/snapshot-store.js'
import { DeviceLink } from '../../app/device-link.js'
import { PollScheduler } from '../../app/poll-scheduler.js'
import type { DeviceConfig } from '../../domain/models/device-config.js'
import type { FieldTransport } from '../../domain/ports/field-transport.js'
import { loadDevicesConfig } from '../config/devices-config.js'
import { OpcuaBlockTransport } from '../opcua/opcua-block-transport.js'
import { SimulatedTransport } from '../simulation/simulated-transport.js'

container.register<DeviceConfig[]>('Devices', {
  useFactory: instanceCachingFactory<DeviceConfig[]>(() => loadDevicesConfig(env.DEVICES_CONFIG_PATH)),
})

container.register<FieldTransport>('FieldTransport', {
  useFactory: instanceCachingFactory<FieldTransport>((c) =>
    env.MOCK_MODE
      ? new SimulatedTransport(c.resolve<DeviceConfig[]>('Devices'))
      : new OpcuaBlockTransport({
          endpoint: env.OPCUA_ENDPOINT,
          nodeTemplate: env.OPCUA_BLOCK_NODE_TEMPLATE,
          securityMode: env.OPCUA_SECURITY_MODE,
        }),
  ),
})

container.register<DeviceLink>('DeviceLink', {
  useFactory: instanceCachingFactory<DeviceLink>(
    (c) =>
      new DeviceLink({
        transport: c.resolve<FieldTransport>('FieldTransport'),
        // maxAttempts counts the first try
        readPolicy: createRetryPolicy(env.DEVICE_READ_RETRY_ATTEMPTS + 1, env.DEVICE_READ_RETRY_DELAY_MS),
        reconnectPolicy: createRetryPolicy(env.DEVICE_RECONNECT_ATTEMPTS, env.DEVICE_RECONNECT_BACKOFF_MS),
        errorThreshold: env.DEVICE_ERROR_THRESHOLD,
        connectTimeoutMs: env.DEVICE_CONNECT_TIMEOUT_MS,
        readTimeoutMs: env.DEVICE_READ_TIMEOUT_MS,
      }),
  ),
})

container.register<PollScheduler>('PollScheduler', {
  useFactory: instanceCachingFactory<PollScheduler>(
    (c) =>
      new PollScheduler({
        link: c.resolve<DeviceLink>('DeviceLink'),
        devices: c.resolve<DeviceConfig[]>('Devices'),
        snapshot: c.resolve<SnapshotStore>('SnapshotStore'),
        batch: c.resolve<BatchWriter>('BatchWriter'),
        intervalMs: env.POLL_INTERVAL_MS,
      }),
  ),
})
