// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import * as net from 'node:net'
import { LoopState, ok, err, type StepResult, type WorkUnit } from '../../src/loops/index.js'

export const Greeting = 'hello!'

/**
 * Layout of the shared status cells a spawned service publishes.
 */
export const PortSlot = 0
export const AcceptsSlot = 1
export const StatusSlots = 2

interface PendingAccept {
  resolve: (socket: net.Socket) => void
  reject: (error: Error) => void
}

/**
 * A classic accept loop as a work unit: each step accepts one connection,
 * writes the greeting and closes it.
 *
 * Connections that arrive between steps queue up, like a listen backlog.
 * After a cancel, at most one more connection is served.
 */
export class HelloService implements WorkUnit<Error> {
  private readonly _server: net.Server
  private readonly _backlog: net.Socket[] = []
  private _pending?: PendingAccept
  private readonly _status?: Int32Array
  private _failure?: Error

  private constructor(server: net.Server, status?: Int32Array) {
    this._server = server
    this._status = status

    server.on('connection', (socket) => this.enqueue(socket))
    server.on('error', (error) => this.fail(error))
    server.on('close', () => this.fail(new Error('HelloService closed')))
  }

  /**
   * Starts listening.
   *
   * @param port Port to bind, 0 for any free port
   * @param host Interface to bind
   * @param status Cells where the bound port and the number of accepts started are published
   */
  static listen(port: number = 0, host: string = '127.0.0.1', status?: Int32Array): Promise<HelloService> {
    return new Promise((resolve, reject) => {
      const server = net.createServer()
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        const service = new HelloService(server, status)
        if (status !== undefined) {
          Atomics.store(status, PortSlot, service.port())
          Atomics.notify(status, PortSlot)
        }
        resolve(service)
      })
    })
  }

  port(): number {
    const address = this._server.address()

    if (address === null || typeof address === 'string') {
      throw new Error('HelloService is not listening on a TCP port')
    }

    return address.port
  }

  async step(): Promise<StepResult<Error>> {
    if (this._status !== undefined) {
      Atomics.add(this._status, AcceptsSlot, 1)
    }

    try {
      const socket = await this.accept()
      await greet(socket)
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)))
    }

    return ok(LoopState.Continue)
  }

  close(): Promise<void> {
    for (const socket of this._backlog.splice(0)) {
      socket.destroy()
    }

    if (!this._server.listening) {
      return Promise.resolve()
    }

    return new Promise((resolve, reject) => {
      this._server.close((error) => (error ? reject(error) : resolve()))
    })
  }

  private accept(): Promise<net.Socket> {
    const socket = this._backlog.shift()

    if (socket !== undefined) {
      return Promise.resolve(socket)
    }

    if (this._failure !== undefined) {
      return Promise.reject(this._failure)
    }

    return new Promise((resolve, reject) => {
      this._pending = { resolve, reject }
    })
  }

  private enqueue(socket: net.Socket): void {
    // a connection reset before it is served is dropped
    socket.on('error', () => socket.destroy())

    const pending = this._pending

    if (pending !== undefined) {
      this._pending = undefined
      pending.resolve(socket)
    } else {
      this._backlog.push(socket)
    }
  }

  private fail(error: Error): void {
    if (this._failure === undefined) {
      this._failure = error
    }

    const pending = this._pending

    if (pending !== undefined) {
      this._pending = undefined
      pending.reject(error)
    }
  }
}

function greet(socket: net.Socket): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.once('error', reject)
    socket.end(Greeting, () => {
      socket.off('error', reject)
      resolve()
    })
  })
}

/**
 * Loop thread factory. The spawning thread reads the bound port, and how
 * many accepts have started, from the shared `status` cells.
 *
 * @param status Shared buffer of `StatusSlots` Int32 cells, all 0 initially
 * @param port Port to bind, 0 for any free port
 */
export function create(status: SharedArrayBuffer, port: number = 0): Promise<HelloService> {
  return HelloService.listen(port, '127.0.0.1', new Int32Array(status))
}
