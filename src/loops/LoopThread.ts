// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Worker entry point of a spawned loop.
 *
 * Builds the work unit from the factory named in `workerData`, steps it
 * while the shared flag says keep running, closes it, and posts the
 * terminal result to the parent. Loaded by the bootstrap in Spawner.ts. A thrown failure is left uncaught so
 * the parent's Worker reports it through its `error` event.
 */

import { parentPort, workerData, type MessagePort } from 'node:worker_threads'
import { CancellationFlag } from './CancellationFlag.js'
import { drive } from './Driver.js'
import { DefaultLogger } from './Logger.js'
import { InvalidWorkUnitError } from './LoopErrors.js'
import { type LoopCompletion, type LoopThreadData, isLoopThreadData } from './LoopThreadMessages.js'
import type { Result } from './Result.js'
import type { WorkUnit } from './WorkUnit.js'

async function instantiate(data: LoopThreadData): Promise<WorkUnit<unknown>> {
  const namespace: Record<string, unknown> = await import(data.moduleUrl)
  const factory = namespace[data.exportName]

  if (typeof factory !== 'function') {
    throw new InvalidWorkUnitError(data.moduleUrl, data.exportName)
  }

  const unit: unknown = await factory(...data.args)

  if (!isWorkUnit(unit)) {
    throw new InvalidWorkUnitError(data.moduleUrl, data.exportName)
  }

  return unit
}

function isWorkUnit(value: unknown): value is WorkUnit<unknown> {
  return typeof value === 'object' && value !== null &&
    'step' in value && typeof value.step === 'function'
}

/**
 * Closes a unit whose step threw. The step's failure is the one reported,
 * so a close failure here is only logged.
 */
async function closeAfterFailure(unit: WorkUnit<unknown>): Promise<void> {
  try {
    await unit.close?.()
  } catch (closeFailure) {
    DefaultLogger.error('Error closing work unit after a failed step:', closeFailure)
  }
}

async function main(port: MessagePort, data: LoopThreadData): Promise<void> {
  const flag = CancellationFlag.attach(data.flag)
  const unit = await instantiate(data)

  let result: Result<void, unknown>

  try {
    result = await drive(unit, () => flag.keepRunning())
  } catch (failure) {
    await closeAfterFailure(unit)
    throw failure
  }

  await unit.close?.()

  const completion: LoopCompletion<unknown> = { type: 'completed', result }
  port.postMessage(completion)
}

const threadPort = parentPort
const threadData: unknown = workerData

if (threadPort === null || !isLoopThreadData(threadData)) {
  throw new Error('LoopThread must be started by spawn()')
}

main(threadPort, threadData).catch((failure: unknown) => {
  // rethrown outside the promise chain so the Worker reports it as uncaught
  process.nextTick(() => {
    throw failure
  })
})
