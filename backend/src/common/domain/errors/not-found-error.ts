/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : NotFoundError
 * @MODULE    : Common / Errors
 * @PURPOSE   : A requested resource does not exist.
 * =======================================================
 *
 * @description
 * Typical cases: a snapshot lookup for a device that never produced a
 * reading, or a device id missing from the configuration.
 *
 * @example
 * throw new NotFoundError('No reading for device', { deviceId })
 */
export class NotFoundError extends AppError {

  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    details?: Record<string, unknown>,
    category: 'DATABASE' | 'VALIDATION' = 'VALIDATION'
  ) {
    super(message, {
      category,
      isOperational: true,
      retryable: false,
    });

    this.name = 'NotFoundError';
    this.details = details;
  }
}
