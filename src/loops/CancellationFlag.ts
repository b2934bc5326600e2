// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

const KEEP_RUNNING = 1
const STOP = 0

const CELL_BYTES = Int32Array.BYTES_PER_ELEMENT

/**
 * A keep-running bit shared between a loop thread and its cancellers.
 *
 * The bit lives in a SharedArrayBuffer and is only touched through
 * `Atomics`, whose operations are sequentially consistent across threads.
 * It starts at keep-running and moves to stop at most once.
 */
export class CancellationFlag {
  private readonly _buffer: SharedArrayBuffer
  private readonly _cell: Int32Array

  private constructor(buffer: SharedArrayBuffer) {
    this._buffer = buffer
    this._cell = new Int32Array(buffer)
  }

  /**
   * Allocates a new flag set to keep running.
   */
  static create(): CancellationFlag {
    const flag = new CancellationFlag(new SharedArrayBuffer(CELL_BYTES))
    Atomics.store(flag._cell, 0, KEEP_RUNNING)
    return flag
  }

  /**
   * Views a flag created elsewhere, typically in another thread.
   *
   * @param buffer The buffer returned by `buffer` on the original flag
   * @throws Error if the buffer is not a flag buffer
   */
  static attach(buffer: SharedArrayBuffer): CancellationFlag {
    if (buffer.byteLength !== CELL_BYTES) {
      throw new Error(`Cancellation flag buffer must be ${CELL_BYTES} bytes, got ${buffer.byteLength}`)
    }

    return new CancellationFlag(buffer)
  }

  /**
   * The shared memory backing this flag, transferable to other threads.
   */
  get buffer(): SharedArrayBuffer {
    return this._buffer
  }

  keepRunning(): boolean {
    return Atomics.load(this._cell, 0) === KEEP_RUNNING
  }

  /**
   * Moves the flag to stop.
   *
   * @returns true if this call changed the flag, false if it was already stopped
   */
  stop(): boolean {
    return Atomics.compareExchange(this._cell, 0, KEEP_RUNNING, STOP) === KEEP_RUNNING
  }
}
