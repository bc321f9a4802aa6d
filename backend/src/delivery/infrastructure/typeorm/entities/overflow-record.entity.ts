/* eslint-disable prettier/prettier */

import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm'

import type { ReadingValue } from '../../../../acquisition/domain/models/reading.js'
import type { BatchPointTags } from '../../../domain/models/batch-point.js'

/**
 * @file overflow-record.entity.ts
 * @description
 * Row of the local SQLite overflow queue. One row per BatchPoint the
 * time-series store refused.
 *
 * - `seq` is AUTOINCREMENT, never reused, and defines the global FIFO
 * - times are stored as epoch milliseconds to keep full precision
 */
@Entity('overflow_records')
export class OverflowRecordEntity {
  @PrimaryGeneratedColumn('increment')
  seq!: number

  @Column('varchar', { length: 64 })
  measurement!: string

  @Column('simple-json')
  tags!: BatchPointTags

  @Column('simple-json')
  fields!: Record<string, ReadingValue>

  /** Point timestamp, epoch ms. */
  @Column('integer')
  time_ms!: number

  @Index()
  @Column('integer')
  enqueued_at_ms!: number

  @Column('integer', { default: 0 })
  attempts!: number
}
