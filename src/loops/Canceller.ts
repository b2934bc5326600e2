// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Cancellable } from './Cancellable.js'
import { CancellationFlag } from './CancellationFlag.js'

/**
 * Lets any holder cancel a running loop.
 *
 * A Canceller does not own the loop, it only signals it. Cancelling does
 * not interrupt a step in progress: the next time a step *would* start,
 * the loop finishes instead. Safe to call any number of times, including
 * after the loop has ended.
 *
 * Cancellers are cheap to clone. To hand one to another worker, post
 * `share()` and rebuild it there with `Canceller.fromShared()`.
 */
export class Canceller implements Cancellable {
  private readonly _flag: CancellationFlag

  /**
   * @param flag The flag of the loop this canceller controls
   */
  constructor(flag: CancellationFlag) {
    this._flag = flag
  }

  /**
   * Rebuilds a canceller from the buffer returned by `share()`.
   *
   * @param buffer Shared memory of the loop's cancellation flag
   */
  static fromShared(buffer: SharedArrayBuffer): Canceller {
    return new Canceller(CancellationFlag.attach(buffer))
  }

  /**
   * Cancels the loop before its next step.
   *
   * @returns true if this call requested the stop, false if already requested
   */
  cancel(): boolean {
    return this._flag.stop()
  }

  isCancelled(): boolean {
    return !this._flag.keepRunning()
  }

  /**
   * Returns another canceller for the same loop.
   */
  clone(): Canceller {
    return new Canceller(this._flag)
  }

  /**
   * Returns the shared memory of the loop's flag, for posting to another thread.
   */
  share(): SharedArrayBuffer {
    return this._flag.buffer
  }
}
