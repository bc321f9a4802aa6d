/* eslint-disable prettier/prettier */

import type { Logger } from 'pino'

import { Mutex } from '../../common/app/concurrency/mutex.js'
import { runWithRetry, sleep, withTimeout, type RetryPolicy, type Sleeper } from '../../common/app/policies/retry-policy.js'
import { describeError } from '../../common/domain/errors/app-error.js'
import { ConnectionError } from '../../common/domain/errors/connection-error.js'
import { DecodeError } from '../../common/domain/errors/decode-error.js'
import { ReadTimeoutError } from '../../common/domain/errors/read-timeout-error.js'
import { err, ok, type Result } from '../../common/domain/result.js'
import { createLogger } from '../../common/infrastructure/logger/index.js'
import { DeviceLinkStatus, type LinkState } from '../domain/models/device-link-status.js'
import type { FieldTransport } from '../domain/ports/field-transport.js'

/**
 * @file device-link.ts
 * @description
 * The single managed connection to the field controller.
 *
 * @remarks
 * Two independent policies:
 * - **read policy**: how many times one `readBlock` is attempted and the
 *   pause before each retry;
 * - **reconnect policy**: how many times one `reconnect()` tries to open
 *   a session and the backoff between tries.
 *
 * Once `consecutiveErrors` reaches `errorThreshold`, the next read forces a
 * reconnect first instead of retrying on a degraded session.
 *
 * After a failed open, further connects from reads are refused with the
 * same `ConnectionError` until `reconnectPolicy.delayMs` has passed, so an
 * unreachable controller costs one connect budget per window instead of
 * one per device.
 *
 * A `DecodeError` from the transport means the node answered with the
 * wrong shape. It is returned as is: no retry, and the session stays
 * healthy for the next device.
 *
 * Every public operation runs under one mutex and a read that times out
 * closes its session before any retry, so at most one transport call is
 * in flight and `disconnect()` waits for a running read.
 */

export type ReadError = ConnectionError | ReadTimeoutError | DecodeError

export type LinkConnected = {
  endpoint: string
  /** True when an existing session passed the liveness probe. */
  reused: boolean
}

export type DeviceLinkOptions = {
  transport: FieldTransport
  readPolicy: RetryPolicy
  reconnectPolicy: RetryPolicy
  errorThreshold: number
  connectTimeoutMs: number
  readTimeoutMs: number
  sleep?: Sleeper
  logger?: Logger
  now?: () => Date
}

export class DeviceLink {
  private readonly transport: FieldTransport
  private readonly mutex = new Mutex()
  private readonly log: Logger
  private readonly sleep: Sleeper
  private readonly now: () => Date

  private state: LinkState = 'Disconnected'
  private unhealthy = false
  private consecutiveErrors = 0
  private totalConnects = 0
  private totalReads = 0
  private totalErrors = 0
  private lastError?: string
  private lastConnectAt?: Date
  private lastReadAt?: Date
  private connectError?: ConnectionError
  private retryConnectAt?: Date

  constructor(private readonly options: DeviceLinkOptions) {
    this.transport = options.transport
    this.log = options.logger ?? createLogger('device-link')
    this.sleep = options.sleep ?? sleep
    this.now = options.now ?? (() => new Date())
  }

  get endpoint(): string {
    return this.transport.endpoint
  }

  get currentState(): LinkState {
    return this.state
  }

  /**
   * Opens a session if none is active. An active session is probed before
   * being reused; a dead one is closed and reopened.
   */
  async connect(): Promise<Result<LinkConnected, ConnectionError>> {
    return this.mutex.runExclusive(() => this.connectUnlocked())
  }

  /**
   * Reads `size` bytes at `offset` of block `blockId`.
   * Failures come back as a typed result; nothing is thrown.
   */
  async readBlock(blockId: number, offset: number, size: number): Promise<Result<Buffer, ReadError>> {
    return this.mutex.runExclusive(async () => {
      if (this.consecutiveErrors >= this.options.errorThreshold) {
        const deferred = this.connectDeferred()
        if (deferred) return err(deferred)

        this.log.warn(
          { endpoint: this.endpoint, consecutiveErrors: this.consecutiveErrors },
          'error threshold reached, forcing reconnect',
        )
        const reconnected = await this.reconnectUnlocked()
        if (!reconnected.ok) return reconnected
      }

      return runWithRetry(this.options.readPolicy, () => this.readOnce(blockId, offset, size), {
        sleep: this.sleep,
        shouldRetry: (error) => error.retryable && !this.connectDeferred(),
        onRetry: (error, nextAttempt) => {
          this.log.warn({ blockId, nextAttempt, err: error.message }, 'block read failed, retrying')
        },
      })
    })
  }

  /** Disconnect-then-connect, capped by the reconnect policy. */
  async reconnect(): Promise<Result<LinkConnected, ConnectionError>> {
    return this.mutex.runExclusive(() => this.reconnectUnlocked())
  }

  /** Closes the session. Never throws. */
  async disconnect(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.closeTransport()
      this.transition('Disconnected')
    })
  }

  getStatus(): DeviceLinkStatus {
    return new DeviceLinkStatus({
      endpoint: this.endpoint,
      state: this.state,
      unhealthy: this.unhealthy,
      consecutiveErrors: this.consecutiveErrors,
      totalConnects: this.totalConnects,
      totalReads: this.totalReads,
      totalErrors: this.totalErrors,
      lastError: this.lastError,
      lastConnectAt: this.lastConnectAt?.toISOString(),
      lastReadAt: this.lastReadAt?.toISOString(),
      nextConnectAt: this.connectDeferred() ? this.retryConnectAt?.toISOString() : undefined,
    })
  }

  private async connectUnlocked(): Promise<Result<LinkConnected, ConnectionError>> {
    const deferred = this.state === 'Connected' ? undefined : this.connectDeferred()
    if (deferred) return err(deferred)

    if (this.state === 'Connected') {
      if (await this.probe()) {
        this.unhealthy = false
        return ok({ endpoint: this.endpoint, reused: true })
      }
      this.log.warn({ endpoint: this.endpoint }, 'liveness probe failed, reopening session')
      await this.closeTransport()
    }

    const opened = await this.open()
    if (!opened.ok) this.transition('Disconnected')
    return opened
  }

  private async reconnectUnlocked(): Promise<Result<LinkConnected, ConnectionError>> {
    this.transition('Reconnecting')

    const result = await runWithRetry(
      this.options.reconnectPolicy,
      async () => {
        await this.closeTransport()
        return this.open()
      },
      {
        sleep: this.sleep,
        onRetry: (error, nextAttempt) => {
          this.log.warn({ endpoint: this.endpoint, nextAttempt, err: error.message }, 'reconnect attempt failed')
        },
      },
    )

    if (!result.ok) {
      this.transition('Disconnected')
      this.log.error({ endpoint: this.endpoint, attempts: this.options.reconnectPolicy.maxAttempts }, 'reconnect gave up')
    }
    return result
  }

  private async open(): Promise<Result<LinkConnected, ConnectionError>> {
    try {
      await withTimeout(this.transport.open(), this.options.connectTimeoutMs, 'connect')
    } catch (cause) {
      const error = new ConnectionError(`Cannot connect to ${this.endpoint}`, this.endpoint, cause)
      this.recordError(error)
      await this.closeTransport()
      this.connectError = error
      this.retryConnectAt = new Date(this.now().getTime() + this.options.reconnectPolicy.delayMs)
      return err(error)
    }

    this.connectError = undefined
    this.retryConnectAt = undefined
    this.totalConnects++
    this.consecutiveErrors = 0
    this.unhealthy = false
    this.lastConnectAt = this.now()
    this.transition('Connected')
    return ok({ endpoint: this.endpoint, reused: false })
  }

  private async readOnce(blockId: number, offset: number, size: number): Promise<Result<Buffer, ReadError>> {
    if (this.state !== 'Connected' || this.unhealthy) {
      const connected = await this.connectUnlocked()
      if (!connected.ok) return connected
    }

    try {
      const data = await withTimeout(
        this.transport.readBlock(blockId, offset, size),
        this.options.readTimeoutMs,
        'readBlock',
      )
      this.consecutiveErrors = 0
      this.unhealthy = false
      this.totalReads++
      this.lastReadAt = this.now()
      return ok(data)
    } catch (cause) {
      if (cause instanceof DecodeError) {
        this.totalErrors++
        this.lastError = describeError(cause)
        return err(cause)
      }

      const error =
        cause instanceof ReadTimeoutError
          ? cause
          : new ConnectionError(`Read of block ${blockId} failed`, this.endpoint, cause)
      this.unhealthy = true
      this.recordError(error)

      if (error instanceof ReadTimeoutError) {
        // the timed-out read is still pending on this session
        await this.closeTransport()
        this.transition('Disconnected')
      }
      return err(error)
    }
  }

  /** The last connect failure while its backoff window is still open. */
  private connectDeferred(): ConnectionError | undefined {
    if (!this.connectError || !this.retryConnectAt) return undefined
    if (this.now().getTime() >= this.retryConnectAt.getTime()) return undefined
    return this.connectError
  }

  private async probe(): Promise<boolean> {
    try {
      return await withTimeout(this.transport.isAlive(), this.options.connectTimeoutMs, 'isAlive')
    } catch (cause) {
      this.log.debug({ endpoint: this.endpoint, err: describeError(cause) }, 'liveness probe threw')
      return false
    }
  }

  private async closeTransport(): Promise<void> {
    try {
      await withTimeout(this.transport.close(), this.options.connectTimeoutMs, 'close')
    } catch (cause) {
      this.log.warn({ endpoint: this.endpoint, err: describeError(cause) }, 'error while closing session')
    }
  }

  private recordError(error: ReadError): void {
    this.consecutiveErrors++
    this.totalErrors++
    this.lastError = describeError(error)
  }

  private transition(next: LinkState): void {
    if (this.state === next) return
    this.log.info({ endpoint: this.endpoint, from: this.state, to: next }, 'device link state change')
    this.state = next
  }
}
