// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderRequest} from './ring-builder-request.js';
import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';
import {type RingDevice} from '../model/device.js';
import {applyDeviceSearchArguments} from './device-search-arguments.js';

/**
 * `search --region --zone --ip --port --device`, exits with 0 when the device is in the ring.
 */
export class SearchRequest implements RingBuilderRequest {
  public constructor(private readonly device: RingDevice) {}

  public apply(builder: RingBuilderExecutionBuilder): void {
    builder.subcommand('search');
    applyDeviceSearchArguments(builder, this.device);
  }
}
