/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : ReadTimeoutError
 * @MODULE    : Common / Errors
 * @PURPOSE   : A bounded operation did not complete in time.
 * =======================================================
 *
 * @description
 * Used for block reads against a reachable controller and, more
 * generally, for any call wrapped by `withTimeout`.
 */
export class ReadTimeoutError extends AppError {
  /** Name of the operation that timed out (e.g. `readBlock`). */
  public readonly operation: string
  public readonly timeoutMs: number

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, {
      category: 'DEVICE',
      isOperational: true,
      retryable: true,
    })

    this.name = 'ReadTimeoutError'
    this.operation = operation
    this.timeoutMs = timeoutMs
  }
}
