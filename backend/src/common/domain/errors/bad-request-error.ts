/* eslint-disable prettier/prettier */

import { AppError } from "./app-error.js";

/**
 * =======================================================
 * @CLASS     : BadRequestError
 * @MODULE    : Common / Errors
 * @PURPOSE   : Invalid input from an HTTP caller or a realtime subscriber.
 * =======================================================
 *
 * @description
 * Raised when a query parameter or an inbound websocket frame does not
 * match its schema. Never retryable: sending the same payload again
 * gives the same answer.
 *
 * @example
 * throw new BadRequestError('deviceId is required', { deviceId })
 */
export class BadRequestError extends AppError {
  /** Optional diagnostic fields (offending values, schema issues). */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, {
      category: 'VALIDATION',
      isOperational: true,
      retryable: false,
    });

    this.name = 'BadRequestError';
    this.details = details;
  }
}
