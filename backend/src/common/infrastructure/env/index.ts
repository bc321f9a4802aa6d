/* eslint-disable prettier/prettier */
import 'dotenv/config'
import { z } from 'zod'

/**
 * @file index.ts
 * @description
 * Loads, validates and types the process environment.
 *
 * - `dotenv` copies `.env` into `process.env`
 * - `zod` validates every variable, applies defaults and coerces strings
 *
 * The rest of the code reads `env`, never `process.env`. A missing or
 * malformed variable stops the process at import time.
 */

/**
 * `z.coerce.boolean()` turns the string "false" into `true`, so flags are
 * parsed from an explicit enum instead.
 */
const flag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false', '1', '0']).default(fallback).transform((v) => v === 'true' || v === '1')

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** Logical process name, prefixed to every logger name. */
  APP_NAME: z.string().default('plc-telemetry'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** HTTP + websocket port. */
  PORT: z.coerce.number().int().nonnegative().default(8080),

  // ------------------------------------------------------------
  // Time-series store (PostgreSQL)
  // ------------------------------------------------------------
  DB_TYPE: z.literal('postgres').default('postgres'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().default(5432),
  DB_SCHEMA: z.string().default('public'),
  DB_NAME: z.string().default('postgres'),
  DB_USER: z.string().default('postgres'),
  DB_PASS: z.string().default('postgres'),

  // ------------------------------------------------------------
  // Field device
  // ------------------------------------------------------------
  /** When true the simulated transport replaces the OPC UA session. */
  MOCK_MODE: flag('false'),
  OPCUA_ENDPOINT: z.string().default('opc.tcp://localhost:4840'),
  /** NodeId of the byte-string variable that exposes a data block; `{block}` is replaced by its number. */
  OPCUA_BLOCK_NODE_TEMPLATE: z.string().default('ns=3;s="DB{block}"'),
  OPCUA_SECURITY_MODE: z.enum(['None', 'Sign', 'SignAndEncrypt']).default('None'),
  DEVICES_CONFIG_PATH: z.string().default('configs/devices.json'),

  DEVICE_CONNECT_TIMEOUT_MS: positiveInt(5_000),
  DEVICE_READ_TIMEOUT_MS: positiveInt(3_000),
  /** Extra attempts after the first failed read. */
  DEVICE_READ_RETRY_ATTEMPTS: nonNegativeInt(2),
  DEVICE_READ_RETRY_DELAY_MS: nonNegativeInt(2_000),
  DEVICE_RECONNECT_ATTEMPTS: positiveInt(3),
  DEVICE_RECONNECT_BACKOFF_MS: nonNegativeInt(1_000),
  /** Consecutive read errors that force a reconnect before the next read. */
  DEVICE_ERROR_THRESHOLD: positiveInt(3),

  // ------------------------------------------------------------
  // Polling / batching
  // ------------------------------------------------------------
  POLL_INTERVAL_MS: positiveInt(5_000),
  BATCH_CYCLES: positiveInt(12),
  BATCH_MAX_AGE_MS: positiveInt(60_000),
  BATCH_MAX_POINTS: positiveInt(500),
  BATCH_FLUSH_CHECK_MS: positiveInt(1_000),
  STORE_WRITE_TIMEOUT_MS: positiveInt(10_000),

  // ------------------------------------------------------------
  // Overflow cache (SQLite)
  // ------------------------------------------------------------
  OVERFLOW_DB_PATH: z.string().default('data/overflow.db'),
  OVERFLOW_MAX_RECORDS: positiveInt(100_000),
  OVERFLOW_EVICTION_POLICY: z.enum(['drop-oldest', 'drop-newest']).default('drop-oldest'),
  OVERFLOW_RETENTION_DAYS: positiveInt(7),
  REPLAY_INTERVAL_MS: positiveInt(60_000),
  REPLAY_BATCH_SIZE: positiveInt(100),

  // ------------------------------------------------------------
  // Realtime
  // ------------------------------------------------------------
  WS_HEARTBEAT_TIMEOUT_MS: positiveInt(45_000),
  WS_REAPER_INTERVAL_MS: positiveInt(10_000),
  WS_PUSH_INTERVAL_MS: positiveInt(1_000),
  WS_SEND_TIMEOUT_MS: positiveInt(5_000),
})

export type Env = z.infer<typeof envSchema>

const __env = envSchema.safeParse(process.env)

if (__env.success === false) {
  throw new Error(`Invalid environment variables: ${__env.error.issues.map((i) => i.path.join('.')).join(', ')}`)
}

export const env: Env = __env.data
