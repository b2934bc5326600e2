// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { spawn, DefaultLogger } from '../../src/loops/index.js'
import { StatusSlots } from './HelloService.js'

/**
 * Hello Service
 *
 * Runs the hello accept loop on its own thread, greeting every
 * connection on 127.0.0.1:6556 (try `nc 127.0.0.1 6556`), and cancels it
 * after ten seconds. The connection that is being awaited when the
 * cancel arrives is still served before the loop ends.
 */

const Port = 6556
const RunForMillis = 10_000

async function main(): Promise<void> {
  const status = new SharedArrayBuffer(StatusSlots * Int32Array.BYTES_PER_ELEMENT)

  const handle = spawn({
    module: new URL('./HelloService.ts', import.meta.url),
    export: 'create',
    args: [status, Port]
  }, { name: 'hello' })

  DefaultLogger.info('server running')

  const exit = handle.canceller()

  setTimeout(() => {
    DefaultLogger.info('server terminating')
    exit.cancel()
  }, RunForMillis)

  const result = await handle.wait()

  if (!result.ok) {
    throw result.error
  }

  DefaultLogger.info('server terminated')
}

main().catch((error: unknown) => {
  DefaultLogger.error('hello service failed:', error)
  process.exitCode = 1
})
