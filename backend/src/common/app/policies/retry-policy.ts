/* eslint-disable prettier/prettier */

import { ReadTimeoutError } from '../../domain/errors/read-timeout-error.js'
import type { Result } from '../../domain/result.js'

/**
 * @file retry-policy.ts
 * @description
 * Bounded retry and timeout primitives shared by the device link and the
 * batch writer.
 *
 * A `RetryPolicy` is plain data (`maxAttempts`, `delayMs`) so the read
 * policy and the reconnect policy can be configured and tested apart from
 * real I/O. Waiting goes through an injectable `Sleeper`; tests pass a
 * recorder instead of a timer.
 */

export type Sleeper = (ms: number) => Promise<void>

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export interface RetryPolicy {
  /** Total attempts, first one included. Always >= 1. */
  readonly maxAttempts: number
  /** Pause before every attempt after the first. */
  readonly delayMs: number
}

export function createRetryPolicy(maxAttempts: number, delayMs: number): RetryPolicy {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`)
  }
  if (delayMs < 0) {
    throw new RangeError(`delayMs must be >= 0, got ${delayMs}`)
  }
  return Object.freeze({ maxAttempts, delayMs })
}

export interface RunWithRetryOptions<E> {
  sleep?: Sleeper
  /** Called after a failed attempt that will be retried. */
  onRetry?: (error: E, nextAttempt: number) => void | Promise<void>
  /** A failure for which this returns false ends the run at once. */
  shouldRetry?: (error: E) => boolean
}

/**
 * Runs `attempt` until it returns `ok` or the policy is exhausted.
 * Returns the last result; never throws on its own.
 */
export async function runWithRetry<T, E>(
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<Result<T, E>>,
  options: RunWithRetryOptions<E> = {},
): Promise<Result<T, E>> {
  const pause = options.sleep ?? sleep

  let result = await attempt(1)
  for (let n = 2; !result.ok && n <= policy.maxAttempts; n++) {
    if (options.shouldRetry && !options.shouldRetry(result.error)) break
    await options.onRetry?.(result.error, n)
    await pause(policy.delayMs)
    result = await attempt(n)
  }
  return result
}

/**
 * Races `promise` against a timer. The timer is always cleared so a
 * settled operation leaves nothing scheduled behind it.
 *
 * @throws ReadTimeoutError when `ms` elapses first.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ReadTimeoutError(operation, ms)), ms)
  })

  try {
    return await Promise.race([promise, timeout])
  } finally {
    if (timer) clearTimeout(timer)
  }
}
