/* eslint-disable prettier/prettier */

import { inject, injectable } from 'tsyringe'
import { DataSource } from 'typeorm'

import type { BatchPoint } from '../../../domain/models/batch-point.js'
import type { TimeSeriesStore } from '../../../domain/repositories/time-series-store.js'

/**
 * @file sensor-data-typeorm.repository.ts
 * @description
 * TimeSeriesStore on PostgreSQL (`sensor_data` table, raw SQL through a
 * QueryRunner).
 *
 * Writes are upserts keyed by (measurement, device_id, module_tag, time),
 * so a replayed point overwrites itself instead of duplicating. A batch
 * is written in one transaction, split into statements of `ROWS_PER_STATEMENT`.
 *
 * The DataSource may still be uninitialized when PostgreSQL was down at
 * startup; every call initializes it on demand.
 */

export const ROWS_PER_STATEMENT = 500

const COLUMNS = [
  'measurement',
  'device_id',
  'device_type',
  'module_type',
  'module_tag',
  'block_id',
  '"time"',
  'fields',
] as const

export type UpsertStatement = {
  sql: string
  params: Array<string | Date>
}

function pointKey(point: BatchPoint): string {
  return `${point.measurement}|${point.tags.device_id}|${point.tags.module_tag}|${point.time.getTime()}`
}

/**
 * Keeps the last occurrence of each key. PostgreSQL refuses an upsert that
 * touches the same row twice in one statement.
 */
export function dedupePoints(points: BatchPoint[]): BatchPoint[] {
  const byKey = new Map<string, BatchPoint>()
  for (const point of points) {
    const key = pointKey(point)
    byKey.delete(key)
    byKey.set(key, point)
  }
  return [...byKey.values()]
}

export function buildUpsert(points: BatchPoint[]): UpsertStatement {
  const params: Array<string | Date> = []
  const tuples = points.map((point) => {
    const base = params.length
    params.push(
      point.measurement,
      point.tags.device_id,
      point.tags.device_type,
      point.tags.module_type,
      point.tags.module_tag,
      point.tags.block_id,
      point.time,
      JSON.stringify(point.fields),
    )
    return `(${COLUMNS.map((_, i) => `$${base + i + 1}`).join(', ')})`
  })

  const sql =
    `INSERT INTO sensor_data (${COLUMNS.join(', ')}) VALUES ${tuples.join(', ')} ` +
    'ON CONFLICT (measurement, device_id, module_tag, "time") DO UPDATE SET ' +
    'device_type = EXCLUDED.device_type, module_type = EXCLUDED.module_type, ' +
    'block_id = EXCLUDED.block_id, fields = EXCLUDED.fields'

  return { sql, params }
}

@injectable()
export class SensorDataTypeormRepository implements TimeSeriesStore {
  private initializing: Promise<DataSource> | null = null

  constructor(
    @inject('DataSource')
    private readonly dataSource: DataSource,
  ) {}

  async writeBatch(points: BatchPoint[]): Promise<void> {
    if (points.length === 0) return
    const rows = dedupePoints(points)

    await this.ensureInitialized()
    const qr = this.dataSource.createQueryRunner()

    try {
      await qr.startTransaction()
      for (let i = 0; i < rows.length; i += ROWS_PER_STATEMENT) {
        const { sql, params } = buildUpsert(rows.slice(i, i + ROWS_PER_STATEMENT))
        await qr.query(sql, params)
      }
      await qr.commitTransaction()
    } catch (err) {
      if (qr.isTransactionActive) await qr.rollbackTransaction()
      throw err
    } finally {
      await qr.release()
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.ensureInitialized()
      await this.dataSource.query('SELECT 1')
      return true
    } catch {
      return false
    }
  }

  private async ensureInitialized(): Promise<void> {
    if (this.dataSource.isInitialized) return
    if (!this.initializing) {
      this.initializing = this.dataSource.initialize().finally(() => {
        this.initializing = null
      })
    }
    await this.initializing
  }
}
