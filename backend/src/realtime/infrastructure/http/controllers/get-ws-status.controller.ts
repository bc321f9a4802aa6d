/* eslint-disable prettier/prettier */
import { Request, Response } from 'express'
import { container } from 'tsyringe'
import { BroadcastHub } from '../../../app/broadcast-hub.js'

/** `GET /ws/status`: connection and channel counts of the realtime feed. */
export async function getWsStatusController(
  _request: Request,
  response: Response,
): Promise<Response> {
  const hub = container.resolve<BroadcastHub>('BroadcastHub')
  const stats = hub.getStats()

  return response.status(200).json({
    success: true,
    data: {
      totalConnections: stats.connections,
      realtimeSubscribers: stats.channels.realtime,
      pushes: stats.pushes,
      lastPushAt: stats.lastPushAt,
    },
  })
}
