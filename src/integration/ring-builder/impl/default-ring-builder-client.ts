// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {type RingBuilderClient} from '../ring-builder-client.js';
import {type RingDevice} from '../model/device.js';
import {RingBuilderExecutionBuilder} from '../execution/ring-builder-execution-builder.js';
import {type RingBuilderExecution} from '../execution/ring-builder-execution.js';
import {type RingBuilderRequest} from '../request/ring-builder-request.js';
import {CreateRequest} from '../request/create-request.js';
import {SearchRequest} from '../request/search-request.js';
import {AddRequest} from '../request/add-request.js';
import {SetWeightRequest} from '../request/set-weight-request.js';
import {RebalanceRequest} from '../request/rebalance-request.js';
import {PretendMinPartHoursPassedRequest} from '../request/pretend-min-part-hours-passed-request.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type KeeperLogger} from '../../../core/logging/keeper-logger.js';
import {PathEx} from '../../../business/utils/path-ex.js';

/**
 * The default implementation of the RingBuilderClient interface.
 */
export class DefaultRingBuilderClient implements RingBuilderClient {
  private readonly logger: KeeperLogger;

  public constructor(
    private readonly executable: string,
    logger?: KeeperLogger,
  ) {
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  public async create(builderFile: string, partPower: number, replicas: number, minPartHours: number): Promise<void> {
    await this.executeAsync(builderFile, new CreateRequest(partPower, replicas, minPartHours));
  }

  public async search(builderFile: string, device: RingDevice): Promise<boolean> {
    const execution: RingBuilderExecution = await this.execute(builderFile, new SearchRequest(device));
    return execution.exitCode() === 0;
  }

  public async add(builderFile: string, device: RingDevice): Promise<void> {
    await this.executeAsync(builderFile, new AddRequest(device));
  }

  public async setWeight(builderFile: string, device: RingDevice): Promise<void> {
    await this.executeAsync(builderFile, new SetWeightRequest(device));
  }

  public async rebalance(builderFile: string): Promise<number> {
    const execution: RingBuilderExecution = await this.execute(builderFile, new RebalanceRequest());
    return execution.exitCode() ?? -1;
  }

  public async pretendMinPartHoursPassed(builderFile: string): Promise<void> {
    await this.executeAsync(builderFile, new PretendMinPartHoursPassedRequest());
  }

  /**
   * Runs the request and requires a zero exit code.
   */
  private async executeAsync(builderFile: string, request: RingBuilderRequest): Promise<void> {
    const execution: RingBuilderExecution = await this.execute(builderFile, request);
    await execution.call();
  }

  /**
   * Runs the request from the directory of the builder file and waits for it to complete.
   */
  private async execute(builderFile: string, request: RingBuilderRequest): Promise<RingBuilderExecution> {
    const builder: RingBuilderExecutionBuilder = new RingBuilderExecutionBuilder(this.executable, this.logger)
      .workingDirectory(PathEx.resolve(path.dirname(builderFile)))
      .builderFile(path.basename(builderFile));
    request.apply(builder);

    const execution: RingBuilderExecution = builder.build();
    const exitCode: number = await execution.waitFor();
    this.logger.debug(`ring-builder exited with code ${exitCode}: ${execution.commandLine()}`, {
      stdout: execution.standardOutput(),
      stderr: execution.standardError(),
    });

    return execution;
  }
}
