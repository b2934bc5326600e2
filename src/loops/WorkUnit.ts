// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { LoopState } from './LoopState.js'
import type { Result } from './Result.js'

/**
 * What a single step reports back to the loop.
 */
export type StepResult<E> = Result<LoopState, E>

/**
 * One unit of repeatable work, such as accepting and serving a connection.
 *
 * The loop that drives a work unit emulates:
 *
 * ```ts
 * for (;;) {
 *   // fetch some work
 *   // do some work that might fail
 * }
 * ```
 *
 * but where the loop can be cancelled between two steps when it was started
 * with `spawn()`. A step that is already executing is never interrupted.
 *
 * @template E The error type a step may return. In a spawned loop it must
 * be structured-cloneable, as the loop's result is posted between threads.
 */
export interface WorkUnit<E = Error> {
  /**
   * Called once for every iteration of the loop.
   *
   * Returning `err(e)` ends the loop with that same error. Returning
   * `ok(LoopState.Break)` ends it successfully, and `ok(LoopState.Continue)`
   * asks for another step. Throwing (or rejecting) is an abnormal failure
   * that reaches whoever waits for the loop.
   */
  step(): StepResult<E> | Promise<StepResult<E>>

  /**
   * Releases whatever the unit holds open.
   * A spawned loop calls this once after its last step, so its thread can exit.
   */
  close?(): void | Promise<void>
}

/**
 * Builds a work unit inside the loop thread from structured-cloneable arguments.
 * Modules handed to `spawn()` export one of these.
 */
export type WorkUnitFactory<E = Error, A extends unknown[] = unknown[]> =
  (...args: A) => WorkUnit<E> | Promise<WorkUnit<E>>
