/* eslint-disable prettier/prettier */
import { mkdirSync } from 'node:fs'
import path from 'node:path'
import { DataSource } from 'typeorm'

import { OverflowRecordEntity } from './entities/overflow-record.entity.js'

/**
 * @file overflow-data-source.ts
 * @description
 * DataSource of the local overflow queue (SQLite via better-sqlite3).
 *
 * Separate from the PostgreSQL DataSource; it must stay writable while
 * PostgreSQL is down. The single table is synchronized on initialize,
 * no migrations.
 */

export const IN_MEMORY = ':memory:'

export function createOverflowDataSource(database: string): DataSource {
  if (database !== IN_MEMORY) {
    mkdirSync(path.dirname(path.resolve(database)), { recursive: true })
  }

  return new DataSource({
    type: 'better-sqlite3',
    database,
    entities: [OverflowRecordEntity],
    synchronize: true,
    logging: false,
  })
}
