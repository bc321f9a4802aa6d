/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : DecodeError
 * @MODULE    : Common / Errors
 * @PURPOSE   : A raw block does not fit its declared layout.
 * =======================================================
 *
 * @description
 * The poll scheduler logs it and skips the device for the current
 * cycle. Reading the same block again will not fix a layout mismatch.
 */
export class DecodeError extends AppError {
  public readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, {
      category: 'DECODE',
      isOperational: true,
      retryable: false,
    })

    this.name = 'DecodeError'
    this.details = details
  }
}
