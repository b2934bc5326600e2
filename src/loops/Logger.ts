// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Logger interface for loop lifecycle logging.
 *
 * Provides fluent API for logging at different levels.
 * All methods return the logger instance for method chaining.
 */
export interface Logger {
  debug(...args: unknown[]): Logger

  error(...args: unknown[]): Logger

  info(...args: unknown[]): Logger

  log(...args: unknown[]): Logger
}

/**
 * Console-based logger implementation.
 * Delegates to the matching console method and returns this.
 */
class ConsoleLogger implements Logger {
  debug(...args: unknown[]): Logger {
    console.debug(...args)
    return this
  }

  error(...args: unknown[]): Logger {
    console.error(...args)
    return this
  }

  info(...args: unknown[]): Logger {
    console.info(...args)
    return this
  }

  log(...args: unknown[]): Logger {
    console.log(...args)
    return this
  }
}

/**
 * Default logger used by spawned loops when no logger is given.
 */
export const DefaultLogger: Logger = new ConsoleLogger()
