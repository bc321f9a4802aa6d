/* eslint-disable prettier/prettier */

import type { Logger } from 'pino'

import { withTimeout } from '../../common/app/policies/retry-policy.js'
import { PeriodicTask, type PeriodicTaskStats } from '../../common/app/tasks/periodic-task.js'
import { describeError } from '../../common/domain/errors/app-error.js'
import { SubscriberSendError } from '../../common/domain/errors/subscriber-send-error.js'
import { createLogger } from '../../common/infrastructure/logger/index.js'
import type { SnapshotStore } from '../../delivery/app/snapshot-store.js'
import {
  errorMessage,
  isChannel,
  parseInbound,
  type Channel,
  type FeedSource,
  type OutboundMessage,
  type RealtimeDataMessage,
} from '../domain/models/messages.js'
import type { Subscriber } from '../domain/models/subscriber.js'
import type { SubscriberConnection } from '../domain/ports/subscriber-connection.js'

/**
 * @file broadcast-hub.ts
 * @description
 * Registry of realtime subscribers and fan-out of the snapshot.
 *
 * @remarks
 * - The push task sends the whole snapshot to every `realtime` subscriber
 *   on a fixed cadence, decoupled from polling.
 * - A send that fails, or does not complete within `sendTimeoutMs`,
 *   removes that subscriber only; the others still get the frame.
 * - The reaper drops subscribers whose last heartbeat is at least
 *   `heartbeatTimeoutMs` old.
 * - Removal is idempotent: the reaper, a failed send and the socket's own
 *   close event may all race to remove the same subscriber.
 */

const PUSH_SUMMARY_EVERY = 50
const NORMAL_CLOSURE = 1000
const GOING_AWAY = 1001
const DEFAULT_SEND_TIMEOUT_MS = 5_000

export type BroadcastHubOptions = {
  snapshot: SnapshotStore
  source: FeedSource
  heartbeatTimeoutMs: number
  pushIntervalMs: number
  reaperIntervalMs: number
  /** Upper bound for a single frame. Defaults to 5 s. */
  sendTimeoutMs?: number
  logger?: Logger
  now?: () => Date
}

export type PushReport = {
  delivered: number
  failed: number
  skipped?: 'no-subscribers' | 'empty-snapshot'
}

export type BroadcastHubStats = {
  connections: number
  channels: Record<Channel, number>
  pushes: number
  lastPushAt?: string
  reaped: number
  sendFailures: number
  tasks: PeriodicTaskStats[]
}

export class BroadcastHub {
  private readonly subscribers = new Map<string, Subscriber>()
  private readonly log: Logger
  private readonly now: () => Date
  private readonly pushTask: PeriodicTask
  private readonly reaperTask: PeriodicTask

  private pushes = 0
  private lastPushAt?: Date
  private reaped = 0
  private sendFailures = 0

  constructor(private readonly options: BroadcastHubOptions) {
    this.log = options.logger ?? createLogger('broadcast-hub')
    this.now = options.now ?? (() => new Date())

    this.pushTask = new PeriodicTask({
      name: 'ws-push',
      intervalMs: options.pushIntervalMs,
      logger: this.log,
      run: async () => {
        await this.pushOnce()
      },
    })
    this.reaperTask = new PeriodicTask({
      name: 'ws-reaper',
      intervalMs: options.reaperIntervalMs,
      logger: this.log,
      run: async () => {
        this.reap()
      },
    })
  }

  start(): void {
    this.pushTask.start()
    this.reaperTask.start()
    this.log.info({ heartbeatTimeoutMs: this.options.heartbeatTimeoutMs, source: this.options.source }, 'broadcast hub started')
  }

  /** Stops both tasks and closes every connection. */
  async stop(): Promise<void> {
    await Promise.all([this.pushTask.stop(), this.reaperTask.stop()])
    for (const id of [...this.subscribers.keys()]) this.remove(id, 'server shutdown', GOING_AWAY)
    this.log.info('broadcast hub stopped')
  }

  register(connection: SubscriberConnection): Subscriber {
    const at = this.now()
    const subscriber: Subscriber = {
      id: connection.id,
      connection,
      channels: new Set(),
      connectedAt: at,
      lastHeartbeatAt: at,
    }
    this.subscribers.set(connection.id, subscriber)

    connection.onMessage((raw) => {
      this.handleMessage(connection.id, raw).catch((error: unknown) => {
        this.log.error({ subscriber: connection.id, err: describeError(error) }, 'message handling failed')
      })
    })
    connection.onClose(() => {
      this.remove(connection.id, 'connection closed')
    })

    this.log.info({ subscriber: connection.id, remote: connection.remoteAddress, connections: this.subscribers.size }, 'subscriber connected')
    return subscriber
  }

  subscribe(id: string, channel: string): boolean {
    const subscriber = this.subscribers.get(id)
    if (!subscriber || !isChannel(channel)) return false
    subscriber.channels.add(channel)
    this.log.info({ subscriber: id, channel, subscribers: this.channelSubscribers(channel) }, 'subscribed')
    return true
  }

  unsubscribe(id: string, channel: string): void {
    const subscriber = this.subscribers.get(id)
    if (!subscriber || !isChannel(channel)) return
    subscriber.channels.delete(channel)
  }

  /** Refreshes the heartbeat with server time. False when `id` is unknown. */
  heartbeat(id: string): boolean {
    const subscriber = this.subscribers.get(id)
    if (!subscriber) return false
    subscriber.lastHeartbeatAt = this.now()
    return true
  }

  /** Dispatches one inbound text frame. Replies go to the sender only. */
  async handleMessage(id: string, raw: string): Promise<void> {
    if (!this.subscribers.has(id)) return

    const parsed = parseInbound(raw)
    if (!parsed.ok) {
      this.log.warn({ subscriber: id, code: parsed.error.code }, parsed.error.message)
      await this.sendTo(id, parsed.error)
      return
    }

    const message = parsed.value
    switch (message.type) {
      case 'subscribe':
        if (!this.subscribe(id, message.channel)) {
          await this.sendTo(id, errorMessage('INVALID_CHANNEL', `Invalid channel: ${message.channel}`))
        }
        return
      case 'unsubscribe':
        this.unsubscribe(id, message.channel)
        return
      case 'heartbeat':
        this.heartbeat(id)
        await this.sendTo(id, { type: 'heartbeat', timestamp: this.now().toISOString() })
        return
    }
  }

  /**
   * Removes subscribers whose heartbeat is `heartbeatTimeoutMs` old or more.
   * @returns the ids removed by this call
   */
  reap(now: Date = this.now()): string[] {
    const expired: string[] = []
    for (const subscriber of this.subscribers.values()) {
      const silentMs = now.getTime() - subscriber.lastHeartbeatAt.getTime()
      if (silentMs >= this.options.heartbeatTimeoutMs) expired.push(subscriber.id)
    }

    for (const id of expired) {
      if (this.remove(id, 'heartbeat timeout')) this.reaped++
    }
    if (expired.length > 0) {
      this.log.warn({ reaped: expired.length, connections: this.subscribers.size }, 'stale subscribers reaped')
    }
    return expired
  }

  /**
   * Drops a subscriber and closes its connection.
   * @returns false when it was already gone
   */
  remove(id: string, reason = 'removed', code = NORMAL_CLOSURE): boolean {
    const subscriber = this.subscribers.get(id)
    if (!subscriber) return false
    this.subscribers.delete(id)

    try {
      subscriber.connection.close(code, reason)
    } catch (error) {
      this.log.debug({ subscriber: id, err: describeError(error) }, 'close on a dead connection')
    }

    this.log.info({ subscriber: id, reason, connections: this.subscribers.size }, 'subscriber removed')
    return true
  }

  /** Sends the current snapshot to every `realtime` subscriber. */
  async pushOnce(): Promise<PushReport> {
    const targets = [...this.subscribers.values()].filter((s) => s.channels.has('realtime'))
    if (targets.length === 0) return { delivered: 0, failed: 0, skipped: 'no-subscribers' }
    if (this.options.snapshot.size === 0) return { delivered: 0, failed: 0, skipped: 'empty-snapshot' }

    const at = this.now()
    const message: RealtimeDataMessage = {
      type: 'realtime_data',
      success: true,
      timestamp: at.toISOString(),
      source: this.options.source,
      data: this.options.snapshot.toJSON(),
    }

    const results = await Promise.all(targets.map((s) => this.sendTo(s.id, message)))
    const delivered = results.filter(Boolean).length

    this.pushes++
    this.lastPushAt = at
    if (this.pushes % PUSH_SUMMARY_EVERY === 0) {
      this.log.info(
        { pushes: this.pushes, subscribers: delivered, devices: Object.keys(message.data), source: this.options.source },
        'push summary',
      )
    }
    return { delivered, failed: targets.length - delivered }
  }

  get connectionCount(): number {
    return this.subscribers.size
  }

  channelSubscribers(channel: Channel): number {
    let count = 0
    for (const subscriber of this.subscribers.values()) if (subscriber.channels.has(channel)) count++
    return count
  }

  getStats(): BroadcastHubStats {
    return {
      connections: this.subscribers.size,
      channels: { realtime: this.channelSubscribers('realtime') },
      pushes: this.pushes,
      lastPushAt: this.lastPushAt?.toISOString(),
      reaped: this.reaped,
      sendFailures: this.sendFailures,
      tasks: [this.pushTask.getStats(), this.reaperTask.getStats()],
    }
  }

  /** True when delivered. A failed send removes the subscriber. */
  private async sendTo(id: string, message: OutboundMessage): Promise<boolean> {
    const subscriber = this.subscribers.get(id)
    if (!subscriber) return false

    try {
      await withTimeout(
        subscriber.connection.send(message),
        this.options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS,
        `send to ${id}`,
      )
      return true
    } catch (cause) {
      const error = cause instanceof SubscriberSendError ? cause : new SubscriberSendError(id, cause)
      this.sendFailures++
      this.log.warn({ subscriber: id, err: describeError(error.cause ?? error) }, 'send failed, dropping subscriber')
      this.remove(id, 'send failed')
      return false
    }
  }
}
