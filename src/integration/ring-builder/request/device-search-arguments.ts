// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';
import {type RingDevice} from '../model/device.js';

/**
 * Applies the arguments that identify a device within a ring.
 */
export function applyDeviceSearchArguments(builder: RingBuilderExecutionBuilder, device: RingDevice): void {
  builder
    .argument('region', device.region.toString())
    .argument('zone', device.zone.toString())
    .argument('ip', device.host)
    .argument('port', device.port.toString())
    .argument('device', device.device);
}
