import type { BatchPoint } from '../../src/delivery/domain/models/batch-point.js'
import type { OverflowRecord } from '../../src/delivery/domain/models/overflow-record.js'
import type { OverflowRepository } from '../../src/delivery/domain/repositories/overflow-repository.js'

export class InMemoryOverflowRepository implements OverflowRepository {
  private records: OverflowRecord[] = []
  private nextSeq = 1
  appendFails = false

  async append(points: BatchPoint[], enqueuedAt: Date): Promise<void> {
    if (this.appendFails) throw new Error('disk full')
    for (const point of points) {
      this.records.push({ seq: this.nextSeq++, point, enqueuedAt, attempts: 0 })
    }
  }

  async oldest(limit: number): Promise<OverflowRecord[]> {
    return this.records.slice(0, limit).map((r) => ({ ...r }))
  }

  async delete(seqs: number[]): Promise<void> {
    const drop = new Set(seqs)
    this.records = this.records.filter((r) => !drop.has(r.seq))
  }

  async incrementAttempts(seqs: number[]): Promise<void> {
    const hit = new Set(seqs)
    for (const r of this.records) if (hit.has(r.seq)) r.attempts++
  }

  async count(): Promise<number> {
    return this.records.length
  }

  async evictOldest(n: number): Promise<number> {
    const removed = Math.min(n, this.records.length)
    this.records = this.records.slice(removed)
    return removed
  }

  async evictNewest(n: number): Promise<number> {
    const removed = Math.min(n, this.records.length)
    this.records = this.records.slice(0, this.records.length - removed)
    return removed
  }

  async deleteEnqueuedBefore(cutoff: Date): Promise<number> {
    const before = this.records.length
    this.records = this.records.filter((r) => r.enqueuedAt.getTime() >= cutoff.getTime())
    return before - this.records.length
  }

  async close(): Promise<void> {
    return undefined
  }

  snapshot(): OverflowRecord[] {
    return this.records.map((r) => ({ ...r }))
  }
}
