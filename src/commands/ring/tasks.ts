// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type KeeperLogger} from '../../core/logging/keeper-logger.js';
import {type RingManager, type DeviceChange} from '../../core/ring-manager.js';
import {type RingArchiveStore} from '../../core/ring-archive-store.js';
import {DevicesFile} from '../../core/devices-file.js';
import {type Device} from '../../integration/ring-builder/model/device.js';
import {RING_TYPES, type RingType} from '../../integration/ring-builder/model/ring-type.js';
import {type ConfigMap} from '../../integration/kube/resources/config-map/config-map.js';
import {type KeeperListrTask} from '../../types/index.js';
import {type RingCommandContext} from './configs.js';

@injectable()
export class RingCommandTasks {
  private readonly ringManager: RingManager;
  private readonly archiveStore: RingArchiveStore;
  private readonly logger: KeeperLogger;

  public constructor(
    @inject(InjectTokens.RingManager) ringManager?: RingManager,
    @inject(InjectTokens.RingArchiveStore) archiveStore?: RingArchiveStore,
    @inject(InjectTokens.KeeperLogger) logger?: KeeperLogger,
  ) {
    this.ringManager = patchInject(ringManager, InjectTokens.RingManager, this.constructor.name);
    this.archiveStore = patchInject(archiveStore, InjectTokens.RingArchiveStore, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  public fetchRings(): KeeperListrTask<RingCommandContext> {
    return {
      title: 'Fetch rings from ConfigMap ',
      task: async (context_, task) => {
        const {archive} = context_.config;
        task.title += archive.configMapName;

        context_.fetched = await this.archiveStore.fetch(archive);
        if (!context_.fetched) {
          task.title = `${task.title} - ${chalk.yellow('not found, starting from empty rings')}`;
        }
      },
    };
  }

  public initRings(): KeeperListrTask<RingCommandContext> {
    return {
      title: 'Create missing ring builders',
      task: async (context_, task) => {
        const created: RingType[] = await this.ringManager.init(context_.config.ring);
        task.title = created.length > 0 ? `Created ring builders: ${created.join(', ')}` : 'Ring builders exist';
      },
    };
  }

  public updateDevices(): KeeperListrTask<RingCommandContext> {
    return {
      title: 'Apply devices file ',
      task: async (context_, task) => {
        const {devicesFile, ring} = context_.config;
        task.title += devicesFile;

        const devices: Device[] = DevicesFile.read(devicesFile);
        const changes: Record<RingType, DeviceChange[]> = await this.ringManager.update(ring, devices);

        const added: number = RING_TYPES.reduce(
          (sum, ringType) => sum + changes[ringType].filter(change => change === 'added').length,
          0,
        );
        const reweighted: number = RING_TYPES.reduce((sum, ringType) => sum + changes[ringType].length, 0) - added;
        task.title = `Applied ${devices.length} devices: ${added} added, ${reweighted} reweighted`;
      },
    };
  }

  public rebalanceRings(): KeeperListrTask<RingCommandContext> {
    return {
      title: 'Rebalance rings',
      task: async (context_, task) => {
        const exitCodes: Record<RingType, number> = await this.ringManager.rebalance(context_.config.ring);
        task.title = RingCommandTasks.rebalanceTitle('Rebalance rings', exitCodes);
      },
    };
  }

  public forcedRebalanceRings(): KeeperListrTask<RingCommandContext> {
    return {
      title: 'Force rebalance rings',
      task: async (context_, task) => {
        const exitCodes: Record<RingType, number> = await this.ringManager.forcedRebalance(context_.config.ring);
        task.title = RingCommandTasks.rebalanceTitle('Force rebalance rings', exitCodes);
      },
    };
  }

  public pushRings(): KeeperListrTask<RingCommandContext> {
    return {
      title: 'Push rings to ConfigMap ',
      task: async (context_, task) => {
        const {archive} = context_.config;
        task.title += archive.configMapName;

        const stored: ConfigMap = await this.archiveStore.persist(archive);
        this.logger.debug(`Stored ConfigMap ${stored.name} at resource version ${stored.resourceVersion ?? 'unknown'}`);
      },
    };
  }

  private static rebalanceTitle(title: string, exitCodes: Record<RingType, number>): string {
    const warnings: RingType[] = RING_TYPES.filter(ringType => exitCodes[ringType] !== 0);
    if (warnings.length === 0) {
      return title;
    }
    return `${title} - ${chalk.yellow(`not rebalanced: ${warnings.join(', ')}`)}`;
  }
}
