/* eslint-disable prettier/prettier */

/**
 * @file index.ts
 * @description
 * DI bindings of the **Realtime** module (`tsyringe`).
 *
 * | Token            | Implementation                  | Lifetime  |
 * |------------------|---------------------------------|-----------|
 * | `'FeedSource'`   | `'mock'` in mock mode, else `'plc'` | Instance |
 * | `'BroadcastHub'` | `BroadcastHub`                  | Singleton |
 */

import { container, instanceCachingFactory } from 'tsyringe'
import { env } from '../../../common/infrastructure/env/index.js'
import type { SnapshotStore } from '../../../delivery/app/snapshot-store.js'
import { BroadcastHub } from '../../app/broadcast-hub.js'
import type { FeedSource } from '../../domain/models/messages.js'

container.registerInstance<FeedSource>('FeedSource', env.MOCK_MODE ? 'mock' : 'plc')

container.register<BroadcastHub>('BroadcastHub', {
  useFactory: instanceCachingFactory<BroadcastHub>(
    (c) =>
      new BroadcastHub({
        snapshot: c.resolve<SnapshotStore>('SnapshotStore'),
        source: c.resolve<FeedSource>('FeedSource'),
        heartbeatTimeoutMs: env.WS_HEARTBEAT_TIMEOUT_MS,
        pushIntervalMs: env.WS_PUSH_INTERVAL_MS,
        reaperIntervalMs: env.WS_REAPER_INTERVAL_MS,
        sendTimeoutMs: env.WS_SEND_TIMEOUT_MS,
      }),
  ),
})
