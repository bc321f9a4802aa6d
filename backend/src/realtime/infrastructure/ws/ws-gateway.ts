/* eslint-disable prettier/prettier */
import { randomUUID } from 'node:crypto'
import type { Server } from 'node:http'

import type { Logger } from 'pino'
import { WebSocketServer } from 'ws'

import { describeError } from '../../../common/domain/errors/app-error.js'
import { createLogger } from '../../../common/infrastructure/logger/index.js'
import type { BroadcastHub } from '../../app/broadcast-hub.js'
import { WsSubscriberConnection } from './ws-subscriber-connection.js'

/**
 * @file ws-gateway.ts
 * @description
 * Attaches the realtime websocket endpoint to the HTTP server and hands
 * every accepted socket to the broadcast hub.
 */

export const REALTIME_PATH = '/ws/realtime'

export type RealtimeGateway = {
  server: WebSocketServer
  close(): Promise<void>
}

export function attachRealtimeGateway(
  httpServer: Server,
  hub: BroadcastHub,
  opts: { path?: string; logger?: Logger } = {},
): RealtimeGateway {
  const log = opts.logger ?? createLogger('ws-gateway')
  const path = opts.path ?? REALTIME_PATH
  const wss = new WebSocketServer({ server: httpServer, path })

  wss.on('connection', (socket, request) => {
    const connection = new WsSubscriberConnection(randomUUID(), socket, request.socket.remoteAddress)
    socket.on('error', (error) => {
      log.warn({ subscriber: connection.id, err: describeError(error) }, 'socket error')
    })
    hub.register(connection)
  })

  wss.on('error', (error) => {
    log.error({ err: describeError(error) }, 'websocket server error')
  })

  log.info({ path }, 'realtime websocket ready')

  return {
    server: wss,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) client.terminate()
        wss.close((error) => (error ? reject(error) : resolve()))
      }),
  }
}
