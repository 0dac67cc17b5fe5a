// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderRequest} from './ring-builder-request.js';
import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';
import {type RingDevice} from '../model/device.js';
import {applyDeviceSearchArguments} from './device-search-arguments.js';

/**
 * `set_weight <search arguments> <weight>`
 */
export class SetWeightRequest implements RingBuilderRequest {
  public constructor(private readonly device: RingDevice) {}

  public apply(builder: RingBuilderExecutionBuilder): void {
    builder.subcommand('set_weight');
    applyDeviceSearchArguments(builder, this.device);
    builder.positional(this.device.weight.toString());
  }
}
