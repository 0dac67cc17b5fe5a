// SPDX-License-Identifier: Apache-2.0

import {KeeperError} from './keeper-error.js';

export class UserBreak extends KeeperError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
