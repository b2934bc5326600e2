// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * The loop thread exited without reporting a result or a failure,
 * for example because it was terminated from outside.
 */
export class LoopThreadExitError extends Error {
  readonly exitCode: number

  constructor(exitCode: number) {
    super(`Loop thread exited with code ${exitCode} before reporting a result`)
    this.name = 'LoopThreadExitError'
    this.exitCode = exitCode
  }
}

/**
 * `wait()` was called on a handle that has already been waited on.
 */
export class HandleConsumedError extends Error {
  constructor() {
    super('Execution handle has already been waited on')
    this.name = 'HandleConsumedError'
  }
}

/**
 * The module handed to `spawn()` does not export a work unit factory
 * under the requested name. Raised inside the loop thread.
 */
export class InvalidWorkUnitError extends Error {
  constructor(moduleUrl: string, exportName: string) {
    super(`Module ${moduleUrl} has no work unit factory exported as '${exportName}'`)
    this.name = 'InvalidWorkUnitError'
  }
}
