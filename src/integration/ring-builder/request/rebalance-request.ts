// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderRequest} from './ring-builder-request.js';
import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';

export class RebalanceRequest implements RingBuilderRequest {
  public apply(builder: RingBuilderExecutionBuilder): void {
    builder.subcommand('rebalance');
  }
}
