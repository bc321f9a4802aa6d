/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : ConnectionError
 * @MODULE    : Common / Errors
 * @PURPOSE   : The field controller could not be reached.
 * =======================================================
 *
 * @description
 * Raised by the device link when opening a session fails, when the
 * liveness probe fails on an existing session, or when a read fails at
 * the transport level. Retried locally inside the link and then
 * surfaced to the poll scheduler as a "skip this device" outcome.
 */
export class ConnectionError extends AppError {
  public readonly endpoint: string

  constructor(message: string, endpoint: string, cause?: unknown) {
    super(message, {
      category: 'DEVICE',
      isOperational: true,
      retryable: true,
      cause,
    })

    this.name = 'ConnectionError'
    this.endpoint = endpoint
  }
}
