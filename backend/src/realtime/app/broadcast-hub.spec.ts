import { BroadcastHub, type BroadcastHubOptions } from './broadcast-hub.js'
import { SnapshotStore } from '../../delivery/app/snapshot-store.js'
import { FakeConnection } from '../../../test/fakes/fake-connection.js'
import { makeReading } from '../../../test/fakes/readings.js'

const T0 = new Date('2026-03-01T08:00:00.000Z')

function after(ms: number): Date {
  return new Date(T0.getTime() + ms)
}

const settle = () => new Promise((resolve) => setImmediate(resolve))

describe('BroadcastHub', () => {
  let snapshot: SnapshotStore
  let clock: Date

  function buildHub(overrides: Partial<BroadcastHubOptions> = {}) {
    return new BroadcastHub({
      snapshot,
      source: 'plc',
      heartbeatTimeoutMs: 45_000,
      pushIntervalMs: 1_000,
      reaperIntervalMs: 10_000,
      now: () => clock,
      ...overrides,
    })
  }

  beforeEach(() => {
    clock = T0
    snapshot = new SnapshotStore()
    snapshot.update('kiln_1', makeReading('kiln_1', '2026-03-01T07:59:55Z', { temperature: 21.5 }))
  })

  describe('pushOnce', () => {
    it('sends the snapshot to realtime subscribers only', async () => {
      const hub = buildHub({ source: 'mock' })
      const listening = new FakeConnection('a')
      const idle = new FakeConnection('b')
      hub.register(listening)
      hub.register(idle)
      hub.subscribe('a', 'realtime')

      await expect(hub.pushOnce()).resolves.toEqual({ delivered: 1, failed: 0 })

      expect(idle.sent).toEqual([])
      expect(listening.sent).toEqual([
        {
          type: 'realtime_data',
          success: true,
          timestamp: '2026-03-01T08:00:00.000Z',
          source: 'mock',
          data: {
            kiln_1: {
              deviceId: 'kiln_1',
              deviceType: 'roller_kiln',
              moduleType: 'temperature',
              moduleTag: 'kiln_1_temp',
              blockId: 9,
              timestamp: '2026-03-01T07:59:55.000Z',
              values: { temperature: 21.5 },
            },
          },
        },
      ])
    })

    it('drops only the subscriber whose send failed', async () => {
      const hub = buildHub()
      const broken = new FakeConnection('a')
      const healthy = new FakeConnection('b')
      for (const c of [broken, healthy]) {
        hub.register(c)
        hub.subscribe(c.id, 'realtime')
      }
      broken.failSends = true

      await expect(hub.pushOnce()).resolves.toEqual({ delivered: 1, failed: 1 })

      expect(healthy.sent).toHaveLength(1)
      expect(hub.connectionCount).toBe(1)
      expect(broken.closes).toEqual([{ code: 1000, reason: 'send failed' }])
      expect(hub.getStats().sendFailures).toBe(1)
    })

    it('gives up on a subscriber that stops reading and keeps pushing to the others', async () => {
      const hub = buildHub({ sendTimeoutMs: 20 })
      const stalled = new FakeConnection('a')
      const healthy = new FakeConnection('b')
      for (const c of [stalled, healthy]) {
        hub.register(c)
        hub.subscribe(c.id, 'realtime')
      }
      stalled.stallSends = true

      await expect(hub.pushOnce()).resolves.toEqual({ delivered: 1, failed: 1 })
      expect(stalled.closes).toEqual([{ code: 1000, reason: 'send failed' }])
      expect(hub.getStats()).toMatchObject({ connections: 1, pushes: 1, sendFailures: 1 })

      await expect(hub.pushOnce()).resolves.toEqual({ delivered: 1, failed: 0 })
      expect(healthy.sent).toHaveLength(2)
    })

    it('skips when nobody listens or there is nothing to send', async () => {
      const hub = buildHub()
      await expect(hub.pushOnce()).resolves.toEqual({ delivered: 0, failed: 0, skipped: 'no-subscribers' })

      const empty = buildHub({ snapshot: new SnapshotStore() })
      const connection = new FakeConnection('a')
      empty.register(connection)
      empty.subscribe('a', 'realtime')
      await expect(empty.pushOnce()).resolves.toEqual({ delivered: 0, failed: 0, skipped: 'empty-snapshot' })
      expect(connection.sent).toEqual([])
    })
  })

  describe('heartbeat and reaping', () => {
    it('drops the silent subscriber at the timeout and keeps the one that kept beating', async () => {
      const hub = buildHub()
      const silent = new FakeConnection('a')
      const beating = new FakeConnection('b')
      hub.register(silent)
      hub.register(beating)

      clock = after(30_000)
      await hub.handleMessage('b', JSON.stringify({ type: 'heartbeat' }))
      expect(beating.sent).toEqual([{ type: 'heartbeat', timestamp: '2026-03-01T08:00:30.000Z' }])

      expect(hub.reap(after(44_999))).toEqual([])
      expect(hub.reap(after(45_000))).toEqual(['a'])
      expect(hub.reap(after(45_000))).toEqual([])

      expect(silent.closes).toEqual([{ code: 1000, reason: 'heartbeat timeout' }])
      expect(hub.connectionCount).toBe(1)
      expect(hub.getStats().reaped).toBe(1)

      expect(hub.reap(after(75_000))).toEqual(['b'])
    })

    it('tolerates the close event of a subscriber already reaped', () => {
      const hub = buildHub()
      const connection = new FakeConnection('a')
      hub.register(connection)

      hub.reap(after(45_000))
      connection.emitClose()

      expect(hub.remove('a')).toBe(false)
      expect(connection.closes).toHaveLength(1)
    })
  })

  describe('inbound messages', () => {
    it('subscribes and unsubscribes through text frames', async () => {
      const hub = buildHub()
      const connection = new FakeConnection('a')
      hub.register(connection)

      connection.emit('{"type":"subscribe","channel":"realtime"}')
      await settle()
      expect(hub.channelSubscribers('realtime')).toBe(1)

      connection.emit('{"type":"unsubscribe","channel":"realtime"}')
      await settle()
      expect(hub.channelSubscribers('realtime')).toBe(0)
      expect(connection.sent).toEqual([])
    })

    it('answers malformed frames with an error and keeps the connection', async () => {
      const hub = buildHub()
      const connection = new FakeConnection('a')
      hub.register(connection)

      await hub.handleMessage('a', 'not json')
      await hub.handleMessage('a', '{"type":"ping"}')
      await hub.handleMessage('a', '{"type":"subscribe"}')
      await hub.handleMessage('a', '[1,2]')
      await hub.handleMessage('a', '{"type":"subscribe","channel":"history"}')

      expect(connection.sent).toEqual([
        { type: 'error', code: 'INVALID_MESSAGE', message: 'Invalid JSON message' },
        { type: 'error', code: 'INVALID_MESSAGE', message: 'Unknown message type: ping' },
        { type: 'error', code: 'INVALID_MESSAGE', message: 'Malformed subscribe message' },
        { type: 'error', code: 'INVALID_MESSAGE', message: 'Message must be a JSON object with a type' },
        { type: 'error', code: 'INVALID_CHANNEL', message: 'Invalid channel: history' },
      ])
      expect(hub.connectionCount).toBe(1)
    })
  })

  it('stops while a subscriber has stopped reading', async () => {
    const hub = buildHub({ pushIntervalMs: 5, sendTimeoutMs: 20 })
    const stalled = new FakeConnection('a')
    hub.register(stalled)
    hub.subscribe('a', 'realtime')
    stalled.stallSends = true

    hub.start()
    await new Promise((resolve) => setTimeout(resolve, 10))
    await hub.stop()

    expect(hub.connectionCount).toBe(0)
    expect(stalled.closes).toHaveLength(1)
  })

  it('closes every connection on stop', async () => {
    const hub = buildHub()
    const a = new FakeConnection('a')
    const b = new FakeConnection('b')
    hub.register(a)
    hub.register(b)

    await hub.stop()

    expect(hub.connectionCount).toBe(0)
    expect(a.closes).toEqual([{ code: 1001, reason: 'server shutdown' }])
    expect(b.closes).toEqual([{ code: 1001, reason: 'server shutdown' }])
  })
})
