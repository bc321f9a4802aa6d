/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : ConfigurationError
 * @MODULE    : Common / Errors
 * @PURPOSE   : Unrecoverable startup configuration problem.
 * =======================================================
 *
 * @description
 * The only error class allowed to terminate the process. Raised while
 * loading the device list or wiring the pipeline, never from the data path.
 */
export class ConfigurationError extends AppError {
  public readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, {
      category: 'CONFIGURATION',
      isOperational: false,
      retryable: false,
      cause,
    })

    this.name = 'ConfigurationError'
    this.details = details
  }
}
