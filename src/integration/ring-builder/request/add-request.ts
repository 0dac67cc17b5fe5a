// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderRequest} from './ring-builder-request.js';
import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';
import {type RingDevice} from '../model/device.js';
import {applyDeviceSearchArguments} from './device-search-arguments.js';

export class AddRequest implements RingBuilderRequest {
  public constructor(private readonly device: RingDevice) {}

  public apply(builder: RingBuilderExecutionBuilder): void {
    builder.subcommand('add');
    applyDeviceSearchArguments(builder, this.device);
    builder.argument('weight', this.device.weight.toString());
  }
}
