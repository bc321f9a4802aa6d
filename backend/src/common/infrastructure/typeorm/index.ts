/* eslint-disable prettier/prettier */
import { DataSource } from 'typeorm'
import { env } from '../env/index.js'

/**
 * @file typeorm/index.ts
 * @description
 * TypeORM DataSource for the PostgreSQL time-series store.
 *
 * - Process singleton, initialized once during bootstrap or lazily by
 *   the store on its first write when PostgreSQL was down at startup.
 * - No entities: `sensor_data` is written through raw upserts.
 * - Migrations live in `./migrations/` and run on initialize.
 */
export const dataSource = new DataSource({
  type: env.DB_TYPE,
  host: env.DB_HOST,
  port: env.DB_PORT,
  schema: env.DB_SCHEMA,
  database: env.DB_NAME,
  username: env.DB_USER,
  password: env.DB_PASS,
  entities: [],
  migrations: [__dirname + '/migrations/*.{ts,js}'],
  migrationsRun: true,
  connectTimeoutMS: env.STORE_WRITE_TIMEOUT_MS,
  logging: env.NODE_ENV === 'development' ? ['error', 'migration'] : false,
})
