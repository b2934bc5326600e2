// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { LoopState } from './LoopState.js'
import { type Result, ok } from './Result.js'
import type { WorkUnit } from './WorkUnit.js'

/**
 * Steps the work unit until it breaks or fails, on the calling thread.
 *
 * The loop has no cancellation of its own: it settles only when the unit
 * decides to stop or returns an error. A throwing step rejects the returned
 * promise with the thrown value.
 *
 * @param unit The work unit to drive
 * @returns `ok()` after a `Break`, or the first error a step returned
 */
export function run<E>(unit: WorkUnit<E>): Promise<Result<void, E>> {
  return drive(unit, () => true)
}

/**
 * Shared loop of `run()` and the loop thread.
 * `keepRunning` is consulted before every step, never during one.
 *
 * @internal
 */
export async function drive<E>(unit: WorkUnit<E>, keepRunning: () => boolean): Promise<Result<void, E>> {
  while (keepRunning()) {
    const result = await unit.step()

    if (!result.ok) {
      return result
    }

    if (result.value === LoopState.Break) {
      break
    }
  }

  return ok()
}
