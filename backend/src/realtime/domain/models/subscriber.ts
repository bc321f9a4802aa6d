/* eslint-disable prettier/prettier */

import type { SubscriberConnection } from '../ports/subscriber-connection.js'
import type { Channel } from './messages.js'

/** Registry entry of the broadcast hub, one per open connection. */
export type Subscriber = {
  id: string
  connection: SubscriberConnection
  channels: Set<Channel>
  connectedAt: Date
  /** Server time of the last heartbeat (or of registration). */
  lastHeartbeatAt: Date
}
