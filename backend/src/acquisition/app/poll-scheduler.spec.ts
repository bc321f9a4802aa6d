import { DeviceLink, type DeviceLinkOptions } from './device-link.js'
import { PollScheduler } from './poll-scheduler.js'
import type { DeviceConfig } from '../domain/models/device-config.js'
import { createRetryPolicy } from '../../common/app/policies/retry-policy.js'
import { BatchWriter } from '../../delivery/app/batch-writer.js'
import { OverflowCache } from '../../delivery/app/overflow-cache.js'
import { SnapshotStore } from '../../delivery/app/snapshot-store.js'
import { FakeTransport } from '../../../test/fakes/fake-transport.js'
import { FakeTimeSeriesStore } from '../../../test/fakes/fake-time-series.store.js'
import { InMemoryOverflowRepository } from '../../../test/fakes/in-memory-overflow.repository.js'

function temperatureDevice(deviceId: string, blockId: number): DeviceConfig {
  return {
    deviceId,
    deviceType: 'roller_kiln',
    moduleType: 'temperature',
    moduleTag: `${deviceId}_zone_1`,
    block: { blockId, offset: 0, size: 2 },
    fields: [{ name: 'Temperature', type: 'Int', offset: 0 }],
  }
}

function hopperScale(deviceId: string, blockId: number): DeviceConfig {
  return {
    deviceId,
    deviceType: 'hopper',
    moduleType: 'WeighSensor',
    moduleTag: `${deviceId}_scale`,
    block: { blockId, offset: 0, size: 6 },
    fields: [
      { name: 'StatusWord', type: 'Word', offset: 0 },
      { name: 'GrossWeight', type: 'DWord', offset: 2 },
    ],
  }
}

function scaleBlock(statusWord: number, grossWeight: number): Buffer {
  const buffer = Buffer.alloc(6)
  buffer.writeUInt16BE(statusWord, 0)
  buffer.writeUInt32BE(grossWeight, 2)
  return buffer
}

function int16(value: number): Buffer {
  const buffer = Buffer.alloc(2)
  buffer.writeInt16BE(value, 0)
  return buffer
}

describe('PollScheduler', () => {
  let transport: FakeTransport
  let store: FakeTimeSeriesStore
  let snapshot: SnapshotStore
  let batch: BatchWriter
  let clock: Date

  function buildScheduler(devices: DeviceConfig[], linkOptions: Partial<DeviceLinkOptions> = {}) {
    const link = new DeviceLink({
      transport,
      readPolicy: createRetryPolicy(1, 0),
      reconnectPolicy: createRetryPolicy(1, 0),
      errorThreshold: 3,
      connectTimeoutMs: 1_000,
      readTimeoutMs: 1_000,
      sleep: async () => undefined,
      ...linkOptions,
    })
    return new PollScheduler({ link, devices, snapshot, batch, intervalMs: 5_000, now: () => clock })
  }

  beforeEach(() => {
    clock = new Date('2026-03-01T08:00:00Z')
    transport = new FakeTransport()
    transport.blocks.set(9, int16(215))
    transport.blocks.set(10, int16(312))
    store = new FakeTimeSeriesStore()
    snapshot = new SnapshotStore()
    const overflow = new OverflowCache({
      repository: new InMemoryOverflowRepository(),
      maxRecords: 1_000,
      evictionPolicy: 'drop-oldest',
      replayBatchSize: 100,
      writeTimeoutMs: 1_000,
      retentionMs: 60_000,
      now: () => clock,
    })
    batch = new BatchWriter({
      store,
      overflow,
      batchCycles: 10,
      maxAgeMs: 60_000,
      maxPoints: 500,
      writeTimeoutMs: 1_000,
      now: () => clock,
    })
  })

  it('produces one converted Reading per device and feeds snapshot and batch', async () => {
    const scheduler = buildScheduler([temperatureDevice('kiln_1', 9), temperatureDevice('kiln_2', 10)])

    const report = await scheduler.runCycle()

    expect(report).toMatchObject({ outcome: 'success', readings: 2, failures: [] })
    expect(snapshot.toJSON()).toEqual({
      kiln_1: {
        deviceId: 'kiln_1',
        deviceType: 'roller_kiln',
        moduleType: 'temperature',
        moduleTag: 'kiln_1_zone_1',
        blockId: 9,
        timestamp: '2026-03-01T08:00:00.000Z',
        values: { temperature: 21.5 },
      },
      kiln_2: {
        deviceId: 'kiln_2',
        deviceType: 'roller_kiln',
        moduleType: 'temperature',
        moduleTag: 'kiln_2_zone_1',
        blockId: 10,
        timestamp: '2026-03-01T08:00:00.000Z',
        values: { temperature: 31.2 },
      },
    })
    expect(batch.getStats()).toMatchObject({ pendingPoints: 2, pendingCycles: 1 })
  })

  it('skips a device whose read fails and keeps polling the others', async () => {
    transport.failingBlocks.add(9)
    const scheduler = buildScheduler([temperatureDevice('kiln_1', 9), temperatureDevice('kiln_2', 10)])

    const report = await scheduler.runCycle()

    expect(report.outcome).toBe('partial')
    expect(report.failures).toEqual([
      { deviceId: 'kiln_1', stage: 'read', error: 'ConnectionError: Read of block 9 failed' },
    ])
    expect(snapshot.get('kiln_1')).toBeUndefined()
    expect(snapshot.get('kiln_2')?.values).toEqual({ temperature: 31.2 })
    expect(batch.getStats().pendingPoints).toBe(1)
  })

  it('reports a layout that does not fit the block as a decode failure', async () => {
    const broken: DeviceConfig = {
      ...temperatureDevice('kiln_1', 9),
      fields: [{ name: 'Temperature', type: 'DInt', offset: 0 }],
    }
    const scheduler = buildScheduler([broken, temperatureDevice('kiln_2', 10)])

    const report = await scheduler.runCycle()

    expect(report.failures).toEqual([
      { deviceId: 'kiln_1', stage: 'decode', error: 'DecodeError: Field "Temperature" lies outside the block' },
    ])
    expect(report.readings).toBe(1)
  })

  it('reports a malformed node as a decode failure without reopening the session', async () => {
    transport.malformedBlocks.add(9)
    const scheduler = buildScheduler([temperatureDevice('kiln_1', 9), temperatureDevice('kiln_2', 10)])

    const report = await scheduler.runCycle()

    expect(report.failures).toEqual([
      { deviceId: 'kiln_1', stage: 'decode', error: 'DecodeError: Node of block 9 does not hold a byte string' },
    ])
    expect(report.readings).toBe(1)
    expect(transport.opens).toBe(1)
  })

  it('bounds the time one cycle spends on an unreachable controller', async () => {
    transport.openFailures = 1_000
    const slept: number[] = []
    const devices = [1, 2, 3, 4, 5, 6].map((blockId) => temperatureDevice(`kiln_${blockId}`, blockId))
    const scheduler = buildScheduler(devices, {
      readPolicy: createRetryPolicy(3, 2_000),
      reconnectPolicy: createRetryPolicy(3, 1_000),
      now: () => clock,
      sleep: async (ms) => {
        slept.push(ms)
      },
    })

    const report = await scheduler.runCycle()

    expect(report.outcome).toBe('total')
    expect(report.failures).toHaveLength(6)
    expect(transport.opens).toBe(1)
    expect(slept).toEqual([])

    clock = new Date(clock.getTime() + 5_000)
    await scheduler.runCycle()
    expect(transport.opens).toBe(2)
    expect(slept).toEqual([])
  })

  it('derives the hopper feed rate from the previous weight', async () => {
    // division code 6 (0.1 kg), stable
    transport.blocks.set(11, scaleBlock(0x0620, 12_350))
    const scheduler = buildScheduler([hopperScale('hopper_1', 11)])

    await scheduler.runCycle()
    expect(snapshot.get('hopper_1')?.values).toEqual({ weight: 1235, feed_rate: 0, is_stable: true, is_overload: false })

    clock = new Date(clock.getTime() + 5_000)
    transport.blocks.set(11, scaleBlock(0x0620, 12_345))
    await scheduler.runCycle()

    expect(snapshot.get('hopper_1')?.values).toEqual({ weight: 1234.5, feed_rate: 360, is_stable: true, is_overload: false })
  })

  it('completes a cycle in which every device failed without throwing', async () => {
    transport.openFailures = 10
    const scheduler = buildScheduler([temperatureDevice('kiln_1', 9), temperatureDevice('kiln_2', 10)])

    const report = await scheduler.runCycle()

    expect(report.outcome).toBe('total')
    expect(report.failures.map((f) => [f.deviceId, f.stage])).toEqual([
      ['kiln_1', 'read'],
      ['kiln_2', 'read'],
    ])
    expect(snapshot.size).toBe(0)
    expect(batch.getStats()).toMatchObject({ pendingPoints: 0, pendingCycles: 0 })
    expect(scheduler.getStats()).toMatchObject({
      cycles: 1,
      outcomes: { success: 0, partial: 0, total: 1 },
      lastOutcome: 'total',
    })
  })

  it('writes ten cycles of two devices as a single batch of twenty points', async () => {
    const scheduler = buildScheduler([temperatureDevice('kiln_1', 9), temperatureDevice('kiln_2', 10)])

    for (let cycle = 0; cycle < 10; cycle++) {
      await scheduler.runCycle()
      if (cycle < 9) {
        await expect(batch.flushIfDue()).resolves.toBeNull()
        clock = new Date(clock.getTime() + 5_000)
      }
    }

    await expect(batch.flushIfDue()).resolves.toEqual({ outcome: 'written', points: 20 })
    expect(store.batches).toHaveLength(1)

    const [written] = store.batches
    expect(written.slice(0, 4).map((p) => [p.tags.device_id, p.time.toISOString()])).toEqual([
      ['kiln_1', '2026-03-01T08:00:00.000Z'],
      ['kiln_2', '2026-03-01T08:00:00.000Z'],
      ['kiln_1', '2026-03-01T08:00:05.000Z'],
      ['kiln_2', '2026-03-01T08:00:05.000Z'],
    ])
    expect(written[19].time.toISOString()).toBe('2026-03-01T08:00:45.000Z')
    expect(batch.getStats()).toMatchObject({ pendingPoints: 0, pendingCycles: 0 })
  })

  it('runs a first cycle on start and stops cleanly', async () => {
    const scheduler = buildScheduler([temperatureDevice('kiln_1', 9)])

    scheduler.start()
    await new Promise((resolve) => setTimeout(resolve, 50))
    await scheduler.stop()

    const stats = scheduler.getStats()
    expect(stats.cycles).toBe(1)
    expect(stats.task.running).toBe(false)
    expect(snapshot.get('kiln_1')?.values).toEqual({ temperature: 21.5 })
  })
})
