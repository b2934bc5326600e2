// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Tests for spawn() on real loop threads.
 *
 * Work units come from tests/fixtures/ScriptedWorkUnit.ts and report
 * their progress through a shared Probe.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { spawn, type SpawnOptions } from '@/loops/Spawner'
import { HandleConsumedError } from '@/loops/LoopErrors'
import { ok, err } from '@/loops/Result'
import { Probe, createProbe, awaitCondition } from '../fixtures/Probe'
import type { ScriptedStep, ScriptOptions } from '../fixtures/ScriptedWorkUnit'

const Fixture = new URL('../fixtures/ScriptedWorkUnit.ts', import.meta.url)

// ============================================================================
// Test Helpers
// ============================================================================

function createLogger() {
  return {
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    log: vi.fn()
  }
}

describe('spawn', () => {
  let buffer: SharedArrayBuffer
  let probe: Probe
  let options: SpawnOptions & { logger: ReturnType<typeof createLogger> }

  beforeEach(() => {
    buffer = createProbe()
    probe = new Probe(buffer)
    options = { name: 'scripted', logger: createLogger() }
  })

  function spawnScripted(script: ScriptedStep[], scriptOptions: ScriptOptions = {}) {
    return spawn<string>({ module: Fixture, export: 'create', args: [buffer, script, scriptOptions] }, options)
  }

  describe('terminal outcomes', () => {
    it('should return ok after exactly three steps when the third breaks', async () => {
      const handle = spawnScripted(['continue', 'continue', 'break'])

      const result = await handle.wait()

      expect(result).toEqual(ok())
      expect(probe.entered()).toBe(3)
      expect(probe.completed()).toBe(3)
    })

    it('should return the error a step returned, without stepping again', async () => {
      const handle = spawnScripted(['continue', { error: 'boom' }, 'continue'])

      const result = await handle.wait()

      expect(result).toEqual(err('boom'))
      expect(probe.entered()).toBe(2)
    })

    it('should reject wait with the failure a step threw', async () => {
      const handle = spawnScripted([{ throws: 'kaboom' }])

      await expect(handle.wait()).rejects.toThrow('kaboom')
      expect(probe.entered()).toBe(1)
      expect(options.logger.error).toHaveBeenCalledWith("Loop 'scripted' failed:", expect.anything())
    })

    it('should close the unit once the loop has ended', async () => {
      const handle = spawnScripted([{ error: 'boom' }])

      await handle.wait()

      expect(probe.closed()).toBe(1)
    })

    it('should close the unit after a thrown failure too', async () => {
      const handle = spawnScripted([{ throws: 'kaboom' }])

      await handle.wait().catch(() => undefined)

      expect(probe.closed()).toBe(1)
    })

    it('should keep the step failure when closing also fails', async () => {
      const handle = spawnScripted([{ throws: 'step failure' }], { closeThrows: 'close failure' })

      await expect(handle.wait()).rejects.toThrow('step failure')
      expect(probe.closed()).toBe(1)
    })

    it('should reject wait with a close failure after a clean loop', async () => {
      const handle = spawnScripted(['break'], { closeThrows: 'close failure' })

      await expect(handle.wait()).rejects.toThrow('close failure')
      expect(probe.closed()).toBe(1)
    })

    it('should reject wait when the returned error cannot be cloned', async () => {
      const handle = spawn({ module: Fixture, export: 'createUncloneable', args: [buffer] }, options)

      await expect(handle.wait()).rejects.toBeTruthy()
      expect(probe.entered()).toBe(1)
    })
  })

  describe('cancellation', () => {
    it('should never step when cancelled before the thread starts', async () => {
      const handle = spawnScripted([])

      handle.cancel()
      const result = await handle.wait()

      expect(result).toEqual(ok())
      expect(probe.entered()).toBe(0)
      expect(probe.closed()).toBe(1)
    })

    it('should let an in-flight step finish and then stop', async () => {
      const handle = spawnScripted([], { gated: true })

      await awaitCondition(() => probe.entered() === 1)
      handle.cancel()
      probe.release()

      const result = await handle.wait()

      expect(result).toEqual(ok())
      expect(probe.completed()).toBe(1)
      expect(probe.entered()).toBe(1)
    })

    it('should stop an endless loop at its next step boundary', async () => {
      const handle = spawnScripted([])

      await awaitCondition(() => probe.completed() > 0)
      handle.cancel()

      const result = await handle.wait()

      expect(result).toEqual(ok())
      expect(probe.entered()).toBe(probe.completed())
    })

    it('should cancel the same loop from every derived canceller', async () => {
      const handle = spawnScripted([], { gated: true })
      const cancellers = [handle.canceller(), handle.canceller(), handle.canceller()]

      await awaitCondition(() => probe.entered() === 1)

      expect(cancellers.map(canceller => canceller.cancel())).toEqual([true, false, false])
      expect(handle.cancel()).toBe(false)
      expect(cancellers.every(canceller => canceller.isCancelled())).toBe(true)

      probe.release()

      await expect(handle.wait()).resolves.toEqual(ok())
      expect(probe.entered()).toBe(1)
    })

    it('should be cancellable from another loop thread', async () => {
      const handle = spawnScripted([], { gated: true })
      await awaitCondition(() => probe.entered() === 1)

      const cancelling = spawn<string>({
        module: Fixture,
        export: 'createCanceller',
        args: [handle.canceller().share()]
      }, options)

      await expect(cancelling.wait()).resolves.toEqual(ok())
      expect(handle.isCancelled()).toBe(true)

      probe.release()

      await expect(handle.wait()).resolves.toEqual(ok())
      expect(probe.entered()).toBe(1)
    })

    it('should stop once when cancelled from several loop threads at the same time', async () => {
      const handle = spawnScripted([], { gated: true })
      await awaitCondition(() => probe.entered() === 1)

      const flag = handle.canceller().share()
      const cancelling = Array.from({ length: 4 }, () => spawn<string>({
        module: Fixture,
        export: 'createCanceller',
        args: [flag]
      }, options))

      const results = await Promise.all(cancelling.map(other => other.wait()))

      expect(results).toEqual([ok(), ok(), ok(), ok()])
      expect(handle.isCancelled()).toBe(true)
      expect(handle.cancel()).toBe(false)

      probe.release()

      await expect(handle.wait()).resolves.toEqual(ok())
      expect(probe.entered()).toBe(1)
      expect(probe.completed()).toBe(1)
    })
  })

  describe('work unit source', () => {
    it('should reject wait when the export is missing', async () => {
      const handle = spawn({ module: Fixture, export: 'missing' }, options)

      await expect(handle.wait()).rejects.toThrow("has no work unit factory exported as 'missing'")
    })

    it('should reject wait when the export is not a function', async () => {
      const handle = spawn({ module: Fixture, export: 'notAFactory' }, options)

      await expect(handle.wait()).rejects.toThrow("has no work unit factory exported as 'notAFactory'")
    })

    it('should reject wait when the factory builds no work unit', async () => {
      const handle = spawn({ module: Fixture, export: 'createNothing' }, options)

      await expect(handle.wait()).rejects.toThrow("has no work unit factory exported as 'createNothing'")
    })
  })

  describe('handle', () => {
    it('should refuse a second wait', async () => {
      const handle = spawnScripted(['break'])

      await handle.wait()

      await expect(handle.wait()).rejects.toBeInstanceOf(HandleConsumedError)
    })

    it('should log the spawn at debug level', async () => {
      const handle = spawnScripted(['break'])
      await handle.wait()

      expect(options.logger.debug).toHaveBeenCalledWith(`Loop 'scripted' spawned from ${Fixture.href}#create`)
    })
  })
})
