// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderRequest} from './ring-builder-request.js';
import {type RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * `create <part_power> <replicas> <min_part_hours>`
 */
export class CreateRequest implements RingBuilderRequest {
  public constructor(
    private readonly partPower: number,
    private readonly replicas: number,
    private readonly minPartHours: number,
  ) {
    if (!Number.isInteger(partPower) || partPower < 1) {
      throw new IllegalArgumentError('part power must be a positive integer', partPower);
    }
    if (!(replicas > 0)) {
      throw new IllegalArgumentError('replicas must be greater than zero', replicas);
    }
    if (!Number.isInteger(minPartHours) || minPartHours < 0) {
      throw new IllegalArgumentError('min part hours must be a non-negative integer', minPartHours);
    }
  }

  public apply(builder: RingBuilderExecutionBuilder): void {
    builder
      .subcommand('create')
      .positional(this.partPower.toString())
      .positional(this.replicas.toString())
      .positional(this.minPartHours.toString());
  }
}
