/* eslint-disable prettier/prettier */

/**
 * @file result.ts
 * @description
 * Discriminated result for operations whose failures are expected
 * outcomes (device reads, store writes) rather than exceptions.
 */

export type Ok<T> = { ok: true; value: T }
export type Err<E> = { ok: false; error: E }
export type Result<T, E> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}
