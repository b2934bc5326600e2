// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Tells the loop whether to keep accepting work after a step.
 */
export enum LoopState {
  /**
   * Accept more work.
   */
  Continue,

  /**
   * Stop accepting work and finish successfully.
   */
  Break
}
