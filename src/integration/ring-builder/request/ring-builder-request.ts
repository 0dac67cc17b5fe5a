// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';

/**
 * A ring-builder subcommand and its parameters, applied to a RingBuilderExecutionBuilder.
 */
export interface RingBuilderRequest {
  /**
   * Applies this request's parameters to the given builder.
   * @param builder The builder to apply the parameters to
   */
  apply(builder: RingBuilderExecutionBuilder): void;
}
