/* eslint-disable prettier/prettier */

import { inject, injectable } from 'tsyringe'
import { DataSource, In, LessThan, type Repository } from 'typeorm'

import type { BatchPoint } from '../../../domain/models/batch-point.js'
import type { OverflowRecord } from '../../../domain/models/overflow-record.js'
import type { OverflowRepository } from '../../../domain/repositories/overflow-repository.js'
import { OverflowRecordEntity } from '../entities/overflow-record.entity.js'

/**
 * @file overflow-typeorm.repository.ts
 * @description
 * OverflowRepository backed by the SQLite DataSource.
 *
 * Statements are chunked to stay below SQLite's bound-parameter limit.
 */

const CHUNK = 100

function chunks<T>(items: T[], size = CHUNK): T[][] {
  const out: T[][] = []
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size))
  return out
}

@injectable()
export class OverflowTypeormRepository implements OverflowRepository {
  private readonly records: Repository<OverflowRecordEntity>

  constructor(
    @inject('OverflowDataSource')
    private readonly dataSource: DataSource,
  ) {
    this.records = dataSource.getRepository(OverflowRecordEntity)
  }

  /** All points of one call land in one transaction, in order. */
  async append(points: BatchPoint[], enqueuedAt: Date): Promise<void> {
    if (points.length === 0) return

    const rows = points.map((point) => ({
      measurement: point.measurement,
      tags: point.tags,
      fields: point.fields,
      time_ms: point.time.getTime(),
      enqueued_at_ms: enqueuedAt.getTime(),
      attempts: 0,
    }))

    await this.dataSource.transaction(async (manager) => {
      for (const chunk of chunks(rows)) await manager.insert(OverflowRecordEntity, chunk)
    })
  }

  async oldest(limit: number): Promise<OverflowRecord[]> {
    const rows = await this.records.find({ order: { seq: 'ASC' }, take: limit })
    return rows.map((row) => this.rowToModel(row))
  }

  async delete(seqs: number[]): Promise<void> {
    for (const chunk of chunks(seqs)) await this.records.delete({ seq: In(chunk) })
  }

  async incrementAttempts(seqs: number[]): Promise<void> {
    for (const chunk of chunks(seqs)) await this.records.increment({ seq: In(chunk) }, 'attempts', 1)
  }

  async count(): Promise<number> {
    return this.records.count()
  }

  async evictOldest(n: number): Promise<number> {
    return this.evict(n, 'ASC')
  }

  async evictNewest(n: number): Promise<number> {
    return this.evict(n, 'DESC')
  }

  async deleteEnqueuedBefore(cutoff: Date): Promise<number> {
    const where = { enqueued_at_ms: LessThan(cutoff.getTime()) }
    const expired = await this.records.countBy(where)
    if (expired > 0) await this.records.delete(where)
    return expired
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) await this.dataSource.destroy()
  }

  private async evict(n: number, order: 'ASC' | 'DESC'): Promise<number> {
    if (n <= 0) return 0
    const victims = await this.records.find({ select: { seq: true }, order: { seq: order }, take: n })
    await this.delete(victims.map((v) => v.seq))
    return victims.length
  }

  private rowToModel(row: OverflowRecordEntity): OverflowRecord {
    return {
      seq: row.seq,
      point: {
        measurement: row.measurement,
        tags: row.tags,
        fields: row.fields,
        time: new Date(row.time_ms),
      },
      enqueuedAt: new Date(row.enqueued_at_ms),
      attempts: row.attempts,
    }
  }
}
