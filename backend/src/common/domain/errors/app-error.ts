/* eslint-disable prettier/prettier */

/**
 * =======================================================
 * @CLASS     : AppError
 * @MODULE    : Common / Errors
 * @PURPOSE   : Base class for every error raised by the acquisition
 *              and delivery pipeline.
 * =======================================================
 *
 * @description
 * Errors in a polling pipeline are mostly expected events: a controller
 * goes offline, the store refuses a write, a websocket client vanishes.
 * The base class carries enough metadata for the caller to decide whether
 * to skip, relocate or retry, and for the logger to classify the event.
 *
 * - `category`      : technical area (device, decode, database, realtime...)
 * - `isOperational` : expected at runtime (true) or a programming bug (false)
 * - `retryable`     : a later attempt may succeed
 * - `cause`         : wrapped original error
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'DEVICE'
  | 'DECODE'
  | 'DATABASE'
  | 'REALTIME'
  | 'INFRASTRUCTURE'
  | 'UNKNOWN';

export interface AppErrorOptions {
  category?: ErrorCategory;
  isOperational?: boolean;
  retryable?: boolean;
  cause?: unknown;
}

export class AppError extends Error {

  /** Technical area the error belongs to. */
  public readonly category: ErrorCategory;

  /**
   * Whether the error is part of normal degraded operation.
   * A dropped controller session is operational, a TypeError is not.
   */
  public readonly isOperational: boolean;

  /** Whether the same operation may succeed if attempted again later. */
  public readonly retryable: boolean;

  /** Original error, kept for the stack. */
  public readonly cause?: unknown;

  public readonly timestamp: Date;

  constructor(
    message: string,
    options: AppErrorOptions = {}
  ) {
    super(message);

    this.name = this.constructor.name;

    this.category = options.category ?? 'UNKNOWN';
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;
    this.timestamp = new Date();

    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Normalizes anything thrown into a short string for status surfaces.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
