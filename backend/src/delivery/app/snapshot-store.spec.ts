import { SnapshotStore } from './snapshot-store.js'
import { makeReading } from '../../../test/fakes/readings.js'

describe('SnapshotStore', () => {
  it('keeps one reading per device, latest wins', () => {
    const store = new SnapshotStore()

    store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:00Z', { temperature: 20 }))
    store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:05Z', { temperature: 21 }))
    store.update('kiln_2', makeReading('kiln_2', '2026-03-01T08:00:05Z', { temperature: 30 }))

    expect(store.size).toBe(2)
    expect(store.get('kiln_1')?.values).toEqual({ temperature: 21 })
  })

  it('refuses a reading older than the stored one', () => {
    const store = new SnapshotStore()
    store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:05Z', { temperature: 21 }))

    const accepted = store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:00Z', { temperature: 99 }))

    expect(accepted).toBe(false)
    expect(store.get('kiln_1')?.values).toEqual({ temperature: 21 })
    expect(store.rejectedUpdates).toBe(1)
  })

  it('accepts a reading with the same timestamp', () => {
    const store = new SnapshotStore()
    store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:05Z', { temperature: 21 }))

    expect(store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:05Z', { temperature: 22 }))).toBe(true)
    expect(store.get('kiln_1')?.values).toEqual({ temperature: 22 })
  })

  it('never goes back in time whatever the update order', () => {
    const store = new SnapshotStore()
    const seconds = [3, 1, 4, 1, 5, 9, 2, 6, 5, 3, 5, 8, 9, 7]
    let newest = -1

    for (const s of seconds) {
      store.update('fan_1', makeReading('fan_1', new Date(Date.UTC(2026, 2, 1, 8, 0, s)).toISOString()))
      newest = Math.max(newest, s)
      expect(store.get('fan_1')?.timestamp.getUTCSeconds()).toBe(newest)
    }
  })

  it('hands out a copy that later updates do not change', () => {
    const store = new SnapshotStore()
    store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:00Z', { temperature: 20 }))

    const copy = store.getAll()
    store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:05Z', { temperature: 21 }))
    store.update('kiln_2', makeReading('kiln_2', '2026-03-01T08:00:05Z'))

    expect(Object.keys(copy)).toEqual(['kiln_1'])
    expect(copy.kiln_1.values).toEqual({ temperature: 20 })
  })

  it('serializes readings with ISO timestamps', () => {
    const store = new SnapshotStore()
    store.update('kiln_1', makeReading('kiln_1', '2026-03-01T08:00:00Z', { temperature: 20 }))

    expect(store.toJSON()).toEqual({
      kiln_1: {
        deviceId: 'kiln_1',
        deviceType: 'roller_kiln',
        moduleType: 'temperature',
        moduleTag: 'kiln_1_temp',
        blockId: 9,
        timestamp: '2026-03-01T08:00:00.000Z',
        values: { temperature: 20 },
      },
    })
  })
})
