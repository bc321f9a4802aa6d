import type { BatchPoint } from '../../src/delivery/domain/models/batch-point.js'
import type { TimeSeriesStore } from '../../src/delivery/domain/repositories/time-series-store.js'

/**
 * Records accepted batches. `down` makes every call fail; `rejectPoint`
 * fails any batch containing a matching point.
 */
export class FakeTimeSeriesStore implements TimeSeriesStore {
  readonly batches: BatchPoint[][] = []
  down = false
  writeCalls = 0
  rejectPoint?: (point: BatchPoint) => boolean

  async writeBatch(points: BatchPoint[]): Promise<void> {
    this.writeCalls++
    if (this.down) throw new Error('connect ECONNREFUSED 127.0.0.1:5432')
    if (this.rejectPoint && points.some(this.rejectPoint)) throw new Error('write rejected')
    this.batches.push([...points])
  }

  async ping(): Promise<boolean> {
    return !this.down
  }

  get received(): BatchPoint[] {
    return this.batches.flat()
  }
}
