// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {type KeeperLogger} from './logging/keeper-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {KeeperError} from './errors/keeper-error.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {PathEx} from '../business/utils/path-ex.js';
import * as constants from './constants.js';
import {builderFileName, RING_TYPES, type RingType} from '../integration/ring-builder/model/ring-type.js';
import {type Device, type RingDevice} from '../integration/ring-builder/model/device.js';
import {type RingBuilderClient} from '../integration/ring-builder/ring-builder-client.js';
import {RingBuilderClientBuilder} from '../integration/ring-builder/ring-builder-client-builder.js';
import {RingBuilderExecutionException} from '../integration/ring-builder/ring-builder-execution-exception.js';

export interface RingSettings {
  /** Directory holding the builder and ring files */
  ringDirectory: string;
  /** Name or path of the ring-builder executable */
  ringBuilder: string;
  partPower: number;
  replicas: number;
  minPartHours: number;
  /** Storage server port per ring */
  ports: Readonly<Record<RingType, number>>;
}

export type DeviceChange = 'added' | 'reweighted';

/**
 * Drives the ring-builder over the account, container and object builders of a ring directory.
 */
@injectable()
export class RingManager {
  private readonly logger: KeeperLogger;

  public constructor(@inject(InjectTokens.KeeperLogger) logger?: KeeperLogger) {
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  public builderPath(settings: RingSettings, ringType: RingType): string {
    return PathEx.join(settings.ringDirectory, builderFileName(ringType));
  }

  /**
   * Creates the builder of every ring that has none. Existing builders are left alone.
   * @returns the rings whose builder was created
   */
  public async init(settings: RingSettings): Promise<RingType[]> {
    fs.mkdirSync(settings.ringDirectory, {recursive: true});
    const client: RingBuilderClient = this.client(settings);

    const created: RingType[] = [];
    for (const ringType of RING_TYPES) {
      const builderFile: string = this.builderPath(settings, ringType);
      if (fs.existsSync(builderFile)) {
        this.logger.debug(`Builder ${builderFile} exists, skipping create`);
        continue;
      }

      try {
        await client.create(builderFile, settings.partPower, settings.replicas, settings.minPartHours);
      } catch (error) {
        throw new KeeperError(`failed to create the ${ringType} ring builder`, error);
      }
      this.logger.info(
        `Created ${builderFile} (part power ${settings.partPower}, replicas ${settings.replicas}, ` +
          `min part hours ${settings.minPartHours})`,
      );
      created.push(ringType);
    }

    return created;
  }

  /**
   * Adds every device to every ring, or sets its weight where the ring already holds it.
   * @returns what happened to each device, per ring
   * @throws IllegalArgumentError if a builder is missing
   */
  public async update(settings: RingSettings, devices: Device[]): Promise<Record<RingType, DeviceChange[]>> {
    this.requireBuilders(settings);
    const client: RingBuilderClient = this.client(settings);

    const changes: Record<RingType, DeviceChange[]> = {account: [], container: [], object: []};
    for (const device of devices) {
      for (const ringType of RING_TYPES) {
        const builderFile: string = this.builderPath(settings, ringType);
        const ringDevice: RingDevice = {...device, port: settings.ports[ringType]};
        const label: string = RingManager.describe(ringDevice);

        try {
          if (await client.search(builderFile, ringDevice)) {
            await client.setWeight(builderFile, ringDevice);
            this.logger.info(`Set weight of ${label} in the ${ringType} ring to ${ringDevice.weight}`);
            changes[ringType].push('reweighted');
          } else {
            await client.add(builderFile, ringDevice);
            this.logger.info(`Added ${label} to the ${ringType} ring with weight ${ringDevice.weight}`);
            changes[ringType].push('added');
          }
        } catch (error) {
          throw new KeeperError(`failed to apply ${label} to the ${ringType} ring`, error);
        }
      }
    }

    return changes;
  }

  /**
   * Rebalances every ring. A non-zero exit of the ring-builder is reported as a warning and otherwise ignored.
   * @returns the ring-builder exit code per ring
   * @throws IllegalArgumentError if a builder is missing
   */
  public async rebalance(settings: RingSettings): Promise<Record<RingType, number>> {
    this.requireBuilders(settings);
    const client: RingBuilderClient = this.client(settings);

    const exitCodes: Record<RingType, number> = {account: 0, container: 0, object: 0};
    for (const ringType of RING_TYPES) {
      exitCodes[ringType] = await this.rebalanceRing(client, settings, ringType);
    }
    return exitCodes;
  }

  /**
   * Rebalances every ring as if `min_part_hours` had passed since the last rebalance.
   * @returns the ring-builder exit code of the rebalance per ring
   * @throws IllegalArgumentError if a builder is missing
   */
  public async forcedRebalance(settings: RingSettings): Promise<Record<RingType, number>> {
    this.requireBuilders(settings);
    const client: RingBuilderClient = this.client(settings);

    const exitCodes: Record<RingType, number> = {account: 0, container: 0, object: 0};
    for (const ringType of RING_TYPES) {
      const builderFile: string = this.builderPath(settings, ringType);
      try {
        await client.pretendMinPartHoursPassed(builderFile);
      } catch (error) {
        if (!(error instanceof RingBuilderExecutionException)) {
          throw error;
        }
        this.logger.warn(
          `pretend_min_part_hours_passed on ${builderFile} exited with code ${error.getExitCode()}: ` +
            error.getStdErr(),
        );
      }
      exitCodes[ringType] = await this.rebalanceRing(client, settings, ringType);
    }
    return exitCodes;
  }

  private async rebalanceRing(client: RingBuilderClient, settings: RingSettings, ringType: RingType): Promise<number> {
    const builderFile: string = this.builderPath(settings, ringType);
    const exitCode: number = await client.rebalance(builderFile);

    if (exitCode === constants.RING_BUILDER_EXIT_SUCCESS) {
      this.logger.info(`Rebalanced the ${ringType} ring`);
    } else if (exitCode === constants.RING_BUILDER_EXIT_WARNING) {
      this.logger.warn(`Rebalance of the ${ringType} ring finished with a warning (exit code ${exitCode})`);
    } else {
      this.logger.warn(`Rebalance of the ${ringType} ring failed (exit code ${exitCode}), continuing`);
    }
    return exitCode;
  }

  private requireBuilders(settings: RingSettings): void {
    const missing: string[] = RING_TYPES.map(ringType => this.builderPath(settings, ringType)).filter(
      builderFile => !fs.existsSync(builderFile),
    );
    if (missing.length > 0) {
      throw new IllegalArgumentError(`missing ring builder ${missing.join(', ')}, run init first`, missing);
    }
  }

  private client(settings: RingSettings): RingBuilderClient {
    return new RingBuilderClientBuilder().executable(settings.ringBuilder).logger(this.logger).build();
  }

  private static describe(device: RingDevice): string {
    return `device r${device.region}z${device.zone}-${device.host}:${device.port}/${device.device}`;
  }
}
