/* eslint-disable prettier/prettier */
import 'reflect-metadata'

import { startApp } from './app.js'
import { createLogger } from './common/infrastructure/logger/index.js'

/**
 * @file index.ts
 * @description
 * Process entry point.
 * - calls startApp()
 * - stops gracefully on SIGINT/SIGTERM
 * - exits non-zero when startup fails (the supervisor restarts the process)
 */

const log = createLogger('main')

startApp()
  .then((running) => {
    const shutdown = (signal: NodeJS.Signals) => {
      log.info({ signal }, 'shutdown requested')
      running
        .stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err }, 'shutdown failed')
          process.exit(1)
        })
    }

    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  })
  .catch((err: unknown) => {
    log.fatal({ err }, 'startup failed')
    process.exit(1)
  })
