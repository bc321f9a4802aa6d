/* eslint-disable prettier/prettier */
import {
  AttributeIds,
  MessageSecurityMode,
  OPCUAClient,
  SecurityPolicy,
  type ClientSession,
  type OPCUAClientOptions,
} from 'node-opcua'
import type { Logger } from 'pino'

import { DecodeError } from '../../../common/domain/errors/decode-error.js'
import { createLogger } from '../../../common/infrastructure/logger/index.js'
import type { FieldTransport } from '../../domain/ports/field-transport.js'

/**
 * =======================================================
 * @CLASS     : OpcuaBlockTransport
 * @MODULE    : Acquisition / OPC UA
 * @PURPOSE   : FieldTransport over an OPC UA session (node-opcua).
 * =======================================================
 *
 * @remarks
 * Every data block the controller exposes is published as one ByteString
 * node, addressed through `nodeTemplate` (`{block}` is replaced by the
 * block number). A read fetches the whole node value and slices
 * `[offset, offset + size)` out of it.
 *
 * Reconnection and retries belong to the DeviceLink: the client is
 * created with `maxRetry: 0` so a failed connect surfaces immediately.
 *
 * A node that answers with the wrong shape (bad status on the node itself,
 * a payload that is not bytes, too few bytes) fails with `DecodeError`.
 * Only session and channel failures surface as plain errors, which the
 * DeviceLink treats as a broken link.
 */

export type SecurityModeName = 'None' | 'Sign' | 'SignAndEncrypt'

export type OpcuaBlockTransportOptions = {
  endpoint: string
  /** NodeId pattern of a block, e.g. `ns=3;s="DB{block}"`. */
  nodeTemplate: string
  securityMode: SecurityModeName
  logger?: Logger
}

/** Server_ServerStatus_State; 0 means Running. */
const SERVER_STATE_NODE = 'ns=0;i=2259'
const SERVER_STATE_RUNNING = 0

function toSecurityPolicy(mode: SecurityModeName): SecurityPolicy {
  return mode === 'None' ? SecurityPolicy.None : SecurityPolicy.Basic256Sha256
}

/** Normalizes the Variant payload of a ByteString or Byte[] node. */
export function toBuffer(value: unknown): Buffer | null {
  if (Buffer.isBuffer(value)) return value
  if (value instanceof Uint8Array) return Buffer.from(value)
  if (Array.isArray(value) && value.every((b): b is number => Number.isInteger(b) && b >= 0 && b <= 255)) {
    return Buffer.from(value)
  }
  return null
}

/** Status codes that mean the session or channel is gone, not the node. */
const LINK_STATUS_PREFIXES = ['BadSession', 'BadSecureChannel', 'BadConnection', 'BadCommunication', 'BadServerNotConnected', 'BadTimeout']

export type NodeStatus = { isGood(): boolean; name: string }

/**
 * Validates one node read and returns `[offset, offset + size)` of it.
 * @throws DecodeError when the node does not hold enough bytes
 */
export function extractBlock(nodeId: string, status: NodeStatus, value: unknown, offset: number, size: number): Buffer {
  if (!status.isGood()) {
    if (LINK_STATUS_PREFIXES.some((prefix) => status.name.startsWith(prefix))) {
      throw new Error(`Read of ${nodeId} returned ${status.name}`)
    }
    throw new DecodeError(`Read of ${nodeId} returned ${status.name}`, { nodeId, status: status.name })
  }

  const bytes = toBuffer(value)
  if (!bytes) throw new DecodeError(`Node ${nodeId} does not hold a byte string`, { nodeId })
  if (offset + size > bytes.length) {
    throw new DecodeError(`Node ${nodeId} holds ${bytes.length} bytes, ${offset + size} requested`, {
      nodeId,
      length: bytes.length,
      requested: offset + size,
    })
  }

  return Buffer.from(bytes.subarray(offset, offset + size))
}

export function blockNodeId(template: string, blockId: number): string {
  return template.replace('{block}', String(blockId))
}

export class OpcuaBlockTransport implements FieldTransport {
  private client: OPCUAClient | null = null
  private session: ClientSession | null = null
  private readonly log: Logger

  constructor(private readonly options: OpcuaBlockTransportOptions) {
    this.log = options.logger ?? createLogger('opcua-transport')
  }

  get endpoint(): string {
    return this.options.endpoint
  }

  async open(): Promise<void> {
    if (this.client) await this.close()

    const clientOptions: OPCUAClientOptions = {
      applicationName: 'plc-telemetry',
      endpointMustExist: false,
      securityMode: MessageSecurityMode[this.options.securityMode],
      securityPolicy: toSecurityPolicy(this.options.securityMode),
      connectionStrategy: { initialDelay: 1000, maxRetry: 0 },
      keepSessionAlive: true,
    }

    const client = OPCUAClient.create(clientOptions)
    this.client = client
    await client.connect(this.endpoint)
    this.session = await client.createSession()

    this.log.info({ endpoint: this.endpoint, securityMode: this.options.securityMode }, 'opc ua session open')
  }

  /** Closes the session, then the client. Errors propagate to the caller. */
  async close(): Promise<void> {
    const session = this.session
    const client = this.client
    this.session = null
    this.client = null

    try {
      if (session) await session.close()
    } finally {
      if (client) await client.disconnect()
    }
  }

  async isAlive(): Promise<boolean> {
    if (!this.session) return false
    const dataValue = await this.session.read({ nodeId: SERVER_STATE_NODE, attributeId: AttributeIds.Value })
    return dataValue.statusCode.isGood() && dataValue.value.value === SERVER_STATE_RUNNING
  }

  async readBlock(blockId: number, offset: number, size: number): Promise<Buffer> {
    if (!this.session) throw new Error('No active OPC UA session')

    const nodeId = blockNodeId(this.options.nodeTemplate, blockId)
    const dataValue = await this.session.read({ nodeId, attributeId: AttributeIds.Value })

    return extractBlock(nodeId, dataValue.statusCode, dataValue.value.value, offset, size)
  }
}
