// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Interface for loops that may be cancelled.
 */
export interface Cancellable {
  /**
   * Requests that the loop stop before its next step.
   *
   * @returns true if this call requested the stop, false if it was already requested
   */
  cancel(): boolean

  /**
   * Returns whether a stop has been requested.
   */
  isCancelled(): boolean
}
