import type { Server } from 'node:http'

import { container } from 'tsyringe'

import { app } from './app.js'
import { ConnectionError } from '../../domain/errors/connection-error.js'
import { SnapshotStore } from '../../../delivery/app/snapshot-store.js'
import { GetDeviceReadingUseCase } from '../../../delivery/app/usecases/get-device-reading.usecase.js'
import { GetLatestReadingsUseCase } from '../../../delivery/app/usecases/get-latest-readings.usecase.js'
import { BroadcastHub } from '../../../realtime/app/broadcast-hub.js'
import { FakeConnection } from '../../../../test/fakes/fake-connection.js'
import { makeReading } from '../../../../test/fakes/readings.js'

describe('HTTP API', () => {
  let server: Server
  let baseUrl: string
  let snapshot: SnapshotStore
  let statusExecute: () => Promise<unknown>

  async function get(path: string): Promise<{ status: number; body: unknown }> {
    const response = await fetch(`${baseUrl}${path}`)
    return { status: response.status, body: await response.json() }
  }

  beforeAll(async () => {
    server = app.listen(0)
    await new Promise((resolve) => server.once('listening', resolve))
    const address = server.address()
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address')
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterAll(async () => {
    await new Promise((resolve) => server.close(resolve))
  })

  beforeEach(() => {
    snapshot = new SnapshotStore()
    snapshot.update('kiln_1', makeReading('kiln_1', '2026-03-01T07:59:55Z', { temperature: 21.5 }))
    statusExecute = async () => ({ status: 'ok' })

    container.registerInstance('GetLatestReadingsUseCase', new GetLatestReadingsUseCase(snapshot))
    container.registerInstance('GetDeviceReadingUseCase', new GetDeviceReadingUseCase(snapshot))
    container.registerInstance('GetPipelineStatusUseCase', { execute: () => statusExecute() })
  })

  afterEach(() => {
    container.reset()
  })

  it('GET /health', async () => {
    expect(await get('/health')).toEqual({ status: 200, body: { status: 'ok' } })
  })

  it('GET /api/realtime/latest returns every device', async () => {
    const { status, body } = await get('/api/realtime/latest')

    expect(status).toBe(200)
    expect(body).toMatchObject({
      success: true,
      data: {
        count: 1,
        devices: {
          kiln_1: { deviceId: 'kiln_1', timestamp: '2026-03-01T07:59:55.000Z', values: { temperature: 21.5 } },
        },
      },
    })
  })

  it('GET /api/realtime/latest/:deviceId returns one Reading', async () => {
    expect(await get('/api/realtime/latest/kiln_1')).toEqual({
      status: 200,
      body: {
        success: true,
        data: {
          deviceId: 'kiln_1',
          deviceType: 'roller_kiln',
          moduleType: 'temperature',
          moduleTag: 'kiln_1_temp',
          blockId: 9,
          timestamp: '2026-03-01T07:59:55.000Z',
          values: { temperature: 21.5 },
        },
      },
    })
  })

  it('answers 404 for a device without a Reading', async () => {
    const { status, body } = await get('/api/realtime/latest/kiln_9')

    expect(status).toBe(404)
    expect(body).toMatchObject({
      error: {
        name: 'NotFoundError',
        message: 'No reading for device',
        category: 'VALIDATION',
        retryable: false,
        details: { deviceId: 'kiln_9' },
      },
    })
  })

  it('GET /ws/status counts connections and realtime subscribers', async () => {
    const hub = new BroadcastHub({
      snapshot,
      source: 'plc',
      heartbeatTimeoutMs: 45_000,
      pushIntervalMs: 1_000,
      reaperIntervalMs: 10_000,
    })
    hub.register(new FakeConnection('a'))
    hub.register(new FakeConnection('b'))
    hub.subscribe('a', 'realtime')
    container.registerInstance('BroadcastHub', hub)

    expect(await get('/ws/status')).toEqual({
      status: 200,
      body: { success: true, data: { totalConnections: 2, realtimeSubscribers: 1, pushes: 0 } },
    })
  })

  it('GET /api/status wraps the pipeline status', async () => {
    expect(await get('/api/status')).toEqual({ status: 200, body: { success: true, data: { status: 'ok' } } })
  })

  it('maps a retryable device error to 503', async () => {
    statusExecute = async () => {
      throw new ConnectionError('Cannot connect to opc.tcp://plc.test:4840', 'opc.tcp://plc.test:4840')
    }

    const { status, body } = await get('/api/status')

    expect(status).toBe(503)
    expect(body).toMatchObject({
      error: { name: 'ConnectionError', category: 'DEVICE', retryable: true, isOperational: true },
    })
  })

  it('hides unexpected errors behind a 500', async () => {
    statusExecute = async () => {
      throw new TypeError('Cannot read properties of undefined')
    }

    const { status, body } = await get('/api/status')

    expect(status).toBe(500)
    expect(body).toMatchObject({ error: { name: 'InternalServerError', message: 'Internal Server Error' } })
  })
})
