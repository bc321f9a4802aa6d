/* eslint-disable prettier/prettier */

import type { OutboundMessage } from '../models/messages.js'

/**
 * @file subscriber-connection.ts
 * @description
 * Transport-neutral handle on one realtime client.
 *
 * `send` rejects when the frame cannot be delivered; the hub then drops
 * that subscriber only. `close` must be safe to call more than once.
 */
export interface SubscriberConnection {
  readonly id: string
  readonly remoteAddress?: string

  send(message: OutboundMessage): Promise<void>

  close(code?: number, reason?: string): void

  /** Registers the handler for inbound text frames. */
  onMessage(handler: (raw: string) => void): void

  onClose(handler: () => void): void
}
