// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { resolve } from 'node:path'
import { pathToFileURL } from 'node:url'
import { Worker, type ResourceLimits } from 'node:worker_threads'
import { CancellationFlag } from './CancellationFlag.js'
import { Canceller } from './Canceller.js'
import { ExecutionHandle } from './ExecutionHandle.js'
import { DefaultLogger, type Logger } from './Logger.js'
import type { LoopThreadData } from './LoopThreadMessages.js'

const LoopThreadEntry = new URL('./LoopThread.ts', import.meta.url)

/**
 * Where a spawned loop finds its work unit.
 *
 * The module is imported inside the loop thread and the named export,
 * a `WorkUnitFactory`, is called with `args`. Arguments must survive
 * structured cloning; a SharedArrayBuffer among them stays shared. So
 * must any error value a step returns, since the loop's result is posted
 * back to the spawning thread.
 */
export interface WorkUnitSource {
  /** File path or URL of the module */
  module: string | URL
  /** Name of the factory export (default: 'default') */
  export?: string
  /** Arguments for the factory */
  args?: unknown[]
}

export interface SpawnOptions {
  /** Label used in log lines (default: 'loop') */
  name?: string
  /** Logger for lifecycle lines (default: DefaultLogger) */
  logger?: Logger
  /**
   * Module whose `register()` installs a loader inside the loop thread before
   * the entry is imported (default: 'tsx/esm/api', to load TypeScript sources).
   * `null` imports the entry without one.
   */
  loader?: string | null
  /** Extra Node options of the loop thread */
  execArgv?: string[]
  /** Heap limits of the loop thread */
  resourceLimits?: ResourceLimits
}

export const DefaultSpawnOptions = {
  name: 'loop',
  logger: DefaultLogger,
  loader: 'tsx/esm/api'
} satisfies SpawnOptions

/**
 * Starts the work unit's loop on a new thread and returns a handle to it.
 *
 * The loop checks its cancellation flag before every step, finishing with
 * `ok()` once cancelled, and otherwise follows the same policy as `run()`.
 * After the last step the unit's `close()` is called.
 *
 * The error type `E` must be structured-cloneable: an `err` value that
 * cannot be cloned turns into an abnormal failure of the loop thread.
 *
 * @param source Module and factory export that build the work unit
 * @param options Thread and logging options
 * @returns A handle to cancel and wait for the loop
 */
export function spawn<E = Error>(source: WorkUnitSource, options: SpawnOptions = {}): ExecutionHandle<E> {
  const name = options.name ?? DefaultSpawnOptions.name
  const logger = options.logger ?? DefaultSpawnOptions.logger
  const flag = CancellationFlag.create()

  const data: LoopThreadData = {
    moduleUrl: toModuleUrl(source.module),
    exportName: source.export ?? 'default',
    args: source.args ?? [],
    flag: flag.buffer
  }

  const loader = options.loader === undefined ? DefaultSpawnOptions.loader : options.loader

  const worker = new Worker(bootstrap(loader), {
    eval: true,
    workerData: data,
    execArgv: options.execArgv,
    resourceLimits: options.resourceLimits
  })

  logger.debug(`Loop '${name}' spawned from ${data.moduleUrl}#${data.exportName}`)

  return new ExecutionHandle<E>(worker, new Canceller(flag), name, logger)
}

/**
 * Source of the loop thread's first script. Node 20 does not carry `--import`
 * hooks into workers, so the loader is registered from inside the thread.
 */
function bootstrap(loader: string | null): string {
  const entry = JSON.stringify(LoopThreadEntry.href)

  if (loader === null) {
    return `import(${entry})`
  }

  return `import(${JSON.stringify(loader)}).then((api) => { api.register(); return import(${entry}) })`
}

function toModuleUrl(module: string | URL): string {
  if (module instanceof URL) {
    return module.href
  }

  return module.startsWith('file:') ? module : pathToFileURL(resolve(module)).href
}
