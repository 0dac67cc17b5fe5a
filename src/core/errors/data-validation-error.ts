// SPDX-License-Identifier: Apache-2.0

import {KeeperError} from './keeper-error.js';

export class DataValidationError extends KeeperError {
  /**
   * Create a custom error for data validation scenario
   *
   * error metadata will include `expected` and `found` values.
   *
   * @param message - error message
   * @param expected - expected value
   * @param found - value found
   * @param cause - source error (if any)
   */
  public constructor(message: string, expected: unknown, found: unknown, cause: unknown = {}) {
    super(message, cause, {expected, found});
  }
}
