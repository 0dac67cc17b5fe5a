// SPDX-License-Identifier: Apache-2.0

import {type RingDevice} from './model/device.js';

/**
 * The client of the ring-builder executable. Every operation works on one builder file, given by its path.
 */
export interface RingBuilderClient {
  /**
   * Creates a builder file.
   *
   * @param builderFile - path of the builder file to create
   * @param partPower - the ring has 2^partPower partitions
   * @param replicas - number of replicas of each partition
   * @param minPartHours - hours before a partition may be moved again
   * @throws RingBuilderExecutionException if the ring-builder fails
   */
  create(builderFile: string, partPower: number, replicas: number, minPartHours: number): Promise<void>;

  /**
   * Looks the device up in the builder.
   * @returns true when the device is present, false on any non-zero exit
   */
  search(builderFile: string, device: RingDevice): Promise<boolean>;

  /**
   * @throws RingBuilderExecutionException if the ring-builder fails
   */
  add(builderFile: string, device: RingDevice): Promise<void>;

  /**
   * Sets the weight of a device already present in the builder.
   * @throws RingBuilderExecutionException if the ring-builder fails
   */
  setWeight(builderFile: string, device: RingDevice): Promise<void>;

  /**
   * Rebalances the builder and writes its ring file.
   * @returns the exit code, 0 when rebalanced, 1 for a warning, 2 or more for an error
   */
  rebalance(builderFile: string): Promise<number>;

  /**
   * @throws RingBuilderExecutionException if the ring-builder fails
   */
  pretendMinPartHoursPassed(builderFile: string): Promise<void>;
}
