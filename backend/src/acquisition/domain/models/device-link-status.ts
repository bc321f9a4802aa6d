/* eslint-disable prettier/prettier */

/**
 * @file device-link-status.ts
 * @description
 * Point-in-time view of the device link, served by the status endpoint.
 *
 * The link itself is infrastructure-heavy (sessions, timers); this model
 * only carries what an operator needs to diagnose degraded mode and
 * derives a health verdict from it.
 */

export type LinkState = 'Disconnected' | 'Connected' | 'Reconnecting'

export type LinkHealth = 'healthy' | 'degraded' | 'disconnected'

export type DeviceLinkStatusProps = {
  endpoint: string
  state: LinkState
  /** Whether the last read failed and the session must be repaired. */
  unhealthy: boolean
  consecutiveErrors: number
  totalConnects: number
  totalReads: number
  totalErrors: number
  lastError?: string
  lastConnectAt?: string
  lastReadAt?: string
  /** Set while connects are held back after a failed one. */
  nextConnectAt?: string
}

export class DeviceLinkStatus {
  public readonly endpoint: string
  public readonly state: LinkState
  public readonly unhealthy: boolean
  public readonly consecutiveErrors: number
  public readonly totalConnects: number
  public readonly totalReads: number
  public readonly totalErrors: number
  public readonly lastError?: string
  public readonly lastConnectAt?: string
  public readonly lastReadAt?: string
  public readonly nextConnectAt?: string

  constructor(props: DeviceLinkStatusProps) {
    this.endpoint = props.endpoint
    this.state = props.state
    this.unhealthy = props.unhealthy
    this.consecutiveErrors = props.consecutiveErrors
    this.totalConnects = props.totalConnects
    this.totalReads = props.totalReads
    this.totalErrors = props.totalErrors
    this.lastError = props.lastError
    this.lastConnectAt = props.lastConnectAt
    this.lastReadAt = props.lastReadAt
    this.nextConnectAt = props.nextConnectAt
  }

  /**
   * - healthy: connected and the last read succeeded
   * - degraded: reconnecting, or connected with failing reads
   * - disconnected: no session
   */
  getHealth(): LinkHealth {
    if (this.state === 'Disconnected') return 'disconnected'
    if (this.state === 'Reconnecting' || this.unhealthy || this.consecutiveErrors > 0) return 'degraded'
    return 'healthy'
  }

  toJSON(): DeviceLinkStatusProps & { health: LinkHealth } {
    return {
      endpoint: this.endpoint,
      state: this.state,
      unhealthy: this.unhealthy,
      consecutiveErrors: this.consecutiveErrors,
      totalConnects: this.totalConnects,
      totalReads: this.totalReads,
      totalErrors: this.totalErrors,
      lastError: this.lastError,
      lastConnectAt: this.lastConnectAt,
      lastReadAt: this.lastReadAt,
      nextConnectAt: this.nextConnectAt,
      health: this.getHealth(),
    }
  }
}
