/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : StoreWriteError
 * @MODULE    : Common / Errors
 * @PURPOSE   : The time-series store is unreachable or rejected a batch.
 * =======================================================
 *
 * @description
 * Never escapes the batch writer: it routes the batch to the overflow
 * cache instead.
 */
export class StoreWriteError extends AppError {
  /** Number of points in the rejected write. */
  public readonly points: number

  constructor(message: string, points: number, cause?: unknown) {
    super(message, {
      category: 'DATABASE',
      isOperational: true,
      retryable: true,
      cause,
    })

    this.name = 'StoreWriteError'
    this.points = points
  }
}
