// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { EventEmitter } from 'node:events'
import type { Cancellable } from './Cancellable.js'
import type { Canceller } from './Canceller.js'
import { HandleConsumedError, LoopThreadExitError } from './LoopErrors.js'
import { type LoopCompletion, isLoopCompletion } from './LoopThreadMessages.js'
import type { Logger } from './Logger.js'
import type { Result } from './Result.js'

/**
 * How the loop thread ended: with a result, or with an abnormal failure.
 */
type Termination<E> =
  | { readonly kind: 'returned'; readonly result: Result<void, E> }
  | { readonly kind: 'failed'; readonly failure: unknown }

/**
 * A handle to a spawned loop.
 *
 * Use it to cancel the loop at its next step boundary (`cancel()`), or to
 * wait for it to end (`wait()`). `canceller()` hands out further cancellers,
 * which is handy when one party waits while another watches for exit
 * signals.
 *
 * The handle listens to the thread from construction, so a loop that fails
 * while nobody is waiting holds its failure until `wait()` is called.
 *
 * @template E The error type the loop's steps may return
 */
export class ExecutionHandle<E = Error> implements Cancellable {
  private readonly _canceller: Canceller
  private readonly _termination: Promise<Termination<E>>
  private _waited: boolean = false

  /**
   * Handles are created by `spawn()`.
   *
   * @param thread The Worker running the loop
   * @param canceller Canceller bound to the loop's flag
   * @param name Label used in log lines
   * @param logger Where lifecycle lines go
   * @internal
   */
  constructor(thread: EventEmitter, canceller: Canceller, name: string, logger: Logger) {
    this._canceller = canceller
    this._termination = new Promise((resolve) => {
      let completion: LoopCompletion<E> | undefined
      let failure: { reason: unknown } | undefined

      thread.on('message', (message: unknown) => {
        if (isLoopCompletion<E>(message)) {
          completion = message
        }
      })

      thread.on('error', (reason: unknown) => {
        if (failure === undefined) {
          failure = { reason }
        }
      })

      thread.once('exit', (exitCode: number) => {
        logger.debug(`Loop '${name}' thread exited with code ${exitCode}`)

        if (failure !== undefined) {
          logger.error(`Loop '${name}' failed:`, failure.reason)
          resolve({ kind: 'failed', failure: failure.reason })
        } else if (completion !== undefined) {
          resolve({ kind: 'returned', result: completion.result })
        } else {
          resolve({ kind: 'failed', failure: new LoopThreadExitError(exitCode) })
        }
      })
    })
  }

  /**
   * Returns another canceller for this loop.
   * Does not consume the handle and may be called any number of times.
   */
  canceller(): Canceller {
    return this._canceller.clone()
  }

  /**
   * Cancels the loop before its next step. An executing step is not interrupted.
   *
   * @returns true if this call requested the stop, false if already requested
   */
  cancel(): boolean {
    return this._canceller.cancel()
  }

  isCancelled(): boolean {
    return this._canceller.isCancelled()
  }

  /**
   * Waits for the loop thread to exit and returns the loop's result.
   *
   * If a step threw, the returned promise rejects with that same failure
   * rather than resolving to an `err` result. May be called only once.
   *
   * @returns `ok()` after a break or cancellation, or the error a step returned
   * @throws HandleConsumedError if the handle was already waited on
   */
  async wait(): Promise<Result<void, E>> {
    if (this._waited) {
      throw new HandleConsumedError()
    }

    this._waited = true

    const termination = await this._termination

    if (termination.kind === 'failed') {
      throw termination.failure
    }

    return termination.result
  }
}
