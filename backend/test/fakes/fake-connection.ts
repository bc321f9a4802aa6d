import type { OutboundMessage } from '../../src/realtime/domain/models/messages.js'
import type { SubscriberConnection } from '../../src/realtime/domain/ports/subscriber-connection.js'

/**
 * Records frames and closes. `failSends` makes every send reject;
 * `stallSends` makes every send hang like a peer that stopped reading.
 */
export class FakeConnection implements SubscriberConnection {
  readonly sent: OutboundMessage[] = []
  readonly closes: Array<{ code?: number; reason?: string }> = []
  failSends = false
  stallSends = false

  private messageHandler: (raw: string) => void = () => undefined
  private closeHandler: () => void = () => undefined

  constructor(readonly id: string) {}

  async send(message: OutboundMessage): Promise<void> {
    if (this.failSends) throw new Error('socket hang up')
    if (this.stallSends) return new Promise<void>(() => undefined)
    this.sent.push(message)
  }

  close(code?: number, reason?: string): void {
    this.closes.push({ code, reason })
  }

  onMessage(handler: (raw: string) => void): void {
    this.messageHandler = handler
  }

  onClose(handler: () => void): void {
    this.closeHandler = handler
  }

  emit(raw: string): void {
    this.messageHandler(raw)
  }

  emitClose(): void {
    this.closeHandler()
  }
}
