// SPDX-License-Identifier: Apache-2.0

import {KeeperError} from './keeper-error.js';

export class SilentBreak extends KeeperError {
  /**
   * A silent break does not display a message to the user
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
