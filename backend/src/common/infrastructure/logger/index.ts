import pino, { type Logger } from 'pino'
import { env } from '../env/index.js'

/**
 * @file logger/index.ts
 * @description
 * One pino logger per module, named `<APP_NAME>:<module>`.
 * Context object first, message second: `log.info({ deviceId }, 'read ok')`.
 */
export function createLogger(name: string): Logger {
  return pino({ name: `${env.APP_NAME}:${name}`, level: env.LOG_LEVEL })
}

export type { Logger }
