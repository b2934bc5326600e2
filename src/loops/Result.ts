// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Successful outcome carrying a value.
 */
export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

/**
 * Failed outcome carrying the error a work unit returned.
 */
export interface Err<E> {
  readonly ok: false
  readonly error: E
}

/**
 * Outcome of a step or of a whole loop.
 *
 * Plain data, so it crosses a worker boundary by structured clone.
 */
export type Result<T, E> = Ok<T> | Err<E>

export function ok(): Ok<void>
export function ok<T>(value: T): Ok<T>
export function ok(value?: unknown): Ok<unknown> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}
