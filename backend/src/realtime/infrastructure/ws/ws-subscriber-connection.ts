/* eslint-disable prettier/prettier */
import WebSocket from 'ws'

import { SubscriberSendError } from '../../../common/domain/errors/subscriber-send-error.js'
import type { OutboundMessage } from '../../domain/models/messages.js'
import type { SubscriberConnection } from '../../domain/ports/subscriber-connection.js'

function toText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  return Buffer.from(data).toString('utf8')
}

const MAX_BUFFERED_BYTES = 1024 * 1024

/**
 * SubscriberConnection over one `ws` socket. Frames are JSON text.
 * A send is refused while more than `maxBufferedBytes` wait in the socket.
 */
export class WsSubscriberConnection implements SubscriberConnection {
  constructor(
    readonly id: string,
    private readonly socket: WebSocket,
    readonly remoteAddress?: string,
    private readonly maxBufferedBytes = MAX_BUFFERED_BYTES,
  ) {}

  send(message: OutboundMessage): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new SubscriberSendError(this.id, new Error(`socket state ${this.socket.readyState}`)))
    }
    if (this.socket.bufferedAmount > this.maxBufferedBytes) {
      return Promise.reject(new SubscriberSendError(this.id, new Error(`${this.socket.bufferedAmount} bytes still buffered`)))
    }
    return new Promise((resolve, reject) => {
      this.socket.send(JSON.stringify(message), (error) => {
        if (error) reject(new SubscriberSendError(this.id, error))
        else resolve()
      })
    })
  }

  close(code = 1000, reason = ''): void {
    if (this.socket.readyState === WebSocket.CLOSED || this.socket.readyState === WebSocket.CLOSING) return
    this.socket.close(code, reason)
  }

  onMessage(handler: (raw: string) => void): void {
    this.socket.on('message', (data, isBinary) => {
      handler(isBinary ? '' : toText(data))
    })
  }

  onClose(handler: () => void): void {
    this.socket.on('close', handler)
  }
}
