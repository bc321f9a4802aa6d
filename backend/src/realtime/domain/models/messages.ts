/* eslint-disable prettier/prettier */
import { z } from 'zod'

import type { ReadingJSON } from '../../../acquisition/domain/models/reading.js'
import { err, ok, type Result } from '../../../common/domain/result.js'

/**
 * @file messages.ts
 * @description
 * Wire format of the realtime websocket, both directions.
 *
 * Client → server: `subscribe`, `unsubscribe`, `heartbeat`.
 * Server → client: `realtime_data`, `heartbeat` (carrying server time), `error`.
 */

export const CHANNELS = ['realtime'] as const

export type Channel = (typeof CHANNELS)[number]

export function isChannel(value: string): value is Channel {
  return CHANNELS.some((channel) => channel === value)
}

export const inboundMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), channel: z.string() }),
  z.object({ type: z.literal('unsubscribe'), channel: z.string() }),
  z.object({ type: z.literal('heartbeat'), timestamp: z.string().optional() }),
])

export type InboundMessage = z.infer<typeof inboundMessageSchema>

export type FeedSource = 'plc' | 'mock'

export type RealtimeDataMessage = {
  type: 'realtime_data'
  success: true
  timestamp: string
  source: FeedSource
  data: Record<string, ReadingJSON>
}

export type HeartbeatReply = {
  type: 'heartbeat'
  timestamp: string
}

export type ErrorCode = 'INVALID_MESSAGE' | 'INVALID_CHANNEL'

export type ErrorMessage = {
  type: 'error'
  code: ErrorCode
  message: string
}

export type OutboundMessage = RealtimeDataMessage | HeartbeatReply | ErrorMessage

export function errorMessage(code: ErrorCode, message: string): ErrorMessage {
  return { type: 'error', code, message }
}

const envelopeSchema = z.object({ type: z.unknown() }).passthrough()

/** Parses one text frame. Never throws. */
export function parseInbound(raw: string): Result<InboundMessage, ErrorMessage> {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return err(errorMessage('INVALID_MESSAGE', 'Invalid JSON message'))
  }

  const envelope = envelopeSchema.safeParse(data)
  if (!envelope.success) {
    return err(errorMessage('INVALID_MESSAGE', 'Message must be a JSON object with a type'))
  }

  const parsed = inboundMessageSchema.safeParse(data)
  if (parsed.success) return ok(parsed.data)

  const { type } = envelope.data
  const known = typeof type === 'string' && ['subscribe', 'unsubscribe', 'heartbeat'].includes(type)
  return err(
    errorMessage(
      'INVALID_MESSAGE',
      known ? `Malformed ${String(type)} message` : `Unknown message type: ${String(type)}`,
    ),
  )
}
