/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : SubscriberSendError
 * @MODULE    : Common / Errors
 * @PURPOSE   : A single realtime client could not receive a frame.
 * =======================================================
 */
export class SubscriberSendError extends AppError {
  public readonly subscriberId: string

  constructor(subscriberId: string, cause?: unknown) {
    super(`Send to subscriber ${subscriberId} failed`, {
      category: 'REALTIME',
      isOperational: true,
      retryable: false,
      cause,
    })

    this.name = 'SubscriberSendError'
    this.subscriberId = subscriberId
  }
}
