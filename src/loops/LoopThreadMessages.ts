// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { Result } from './Result.js'

/**
 * Everything a loop thread needs to build and run its work unit,
 * passed as the Worker's `workerData`.
 */
export interface LoopThreadData {
  readonly moduleUrl: string
  readonly exportName: string
  readonly args: unknown[]
  readonly flag: SharedArrayBuffer
}

/**
 * Posted by the loop thread once its loop has ended and its unit is closed.
 */
export interface LoopCompletion<E> {
  readonly type: 'completed'
  readonly result: Result<void, E>
}

export function isLoopThreadData(value: unknown): value is LoopThreadData {
  if (typeof value !== 'object' || value === null) {
    return false
  }

  return 'moduleUrl' in value && typeof value.moduleUrl === 'string' &&
    'exportName' in value && typeof value.exportName === 'string' &&
    'args' in value && Array.isArray(value.args) &&
    'flag' in value && value.flag instanceof SharedArrayBuffer
}

/**
 * The error type is not observable at run time; it is whatever the
 * spawned unit returned, taken on trust as `E`.
 */
export function isLoopCompletion<E>(message: unknown): message is LoopCompletion<E> {
  if (typeof message !== 'object' || message === null) {
    return false
  }

  if (!('type' in message) || message.type !== 'completed' || !('result' in message)) {
    return false
  }

  const result = message.result

  return typeof result === 'object' && result !== null &&
    'ok' in result && typeof result.ok === 'boolean'
}
