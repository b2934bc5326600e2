// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Cancellable service loops for Node.js worker threads
 *
 * @packageDocumentation
 */

// Work units
export { LoopState } from './LoopState.js'
export { ok, err } from './Result.js'
export type { Result, Ok, Err } from './Result.js'
export type { WorkUnit, WorkUnitFactory, StepResult } from './WorkUnit.js'

// Running on the current thread
export { run } from './Driver.js'

// Running on a loop thread
export { spawn, DefaultSpawnOptions } from './Spawner.js'
export type { SpawnOptions, WorkUnitSource } from './Spawner.js'
export { ExecutionHandle } from './ExecutionHandle.js'

// Cancellation
export type { Cancellable } from './Cancellable.js'
export { Canceller } from './Canceller.js'
export { CancellationFlag } from './CancellationFlag.js'

// Errors
export { LoopThreadExitError, HandleConsumedError, InvalidWorkUnitError } from './LoopErrors.js'

// Logging
export { DefaultLogger } from './Logger.js'
export type { Logger } from './Logger.js'
