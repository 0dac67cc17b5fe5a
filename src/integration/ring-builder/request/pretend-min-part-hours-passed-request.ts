// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderRequest} from './ring-builder-request.js';
import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';

/**
 * Resets the clock on the last time a rebalance happened, so the next rebalance may move any partition.
 */
export class PretendMinPartHoursPassedRequest implements RingBuilderRequest {
  public apply(builder: RingBuilderExecutionBuilder): void {
    builder.subcommand('pretend_min_part_hours_passed');
  }
}
