// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../flags.js';
import * as constants from '../../core/constants.js';
import {type ConfigManager} from '../../core/config-manager.js';
import {type KeeperLogger} from '../../core/logging/keeper-logger.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {isDns1123Subdomain} from '../../integration/kube/kube-validation.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type CommandFlag} from '../../types/flag-types.js';
import {type RingSettings} from '../../core/ring-manager.js';
import {type RingArchiveSettings} from '../../core/ring-archive-store.js';
import {type OwnerReference} from '../../integration/kube/resources/config-map/owner-reference.js';

const CONFIG_MAP_KEY = /^[-._a-zA-Z0-9]+$/;

export interface RingCommandConfig {
  ring: RingSettings;
  archive: RingArchiveSettings;
  devicesFile: string;
}

export interface RingCommandContext {
  config: RingCommandConfig;
  /** Set by the fetch task, false when the ConfigMap does not exist */
  fetched?: boolean;
}

@injectable()
export class RingCommandConfigs {
  private readonly configManager: ConfigManager;
  private readonly logger: KeeperLogger;

  public constructor(
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.KeeperLogger) logger?: KeeperLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  /**
   * Builds the settings of a ring command from its arguments, flags a command does not take get their defaults.
   * @throws IllegalArgumentError if a flag value is invalid
   */
  public configBuilder(argv: ArgvStruct): RingCommandConfig {
    this.configManager.reset();
    this.configManager.update(argv);

    const ringDirectory: string = PathEx.resolve(this.string(flags.ringDirectory, constants.DEFAULT_RING_DIR));

    const config: RingCommandConfig = {
      ring: {
        ringDirectory,
        ringBuilder: this.executable(this.string(flags.ringBuilder, constants.RING_BUILDER)),
        partPower: this.number(flags.partPower, constants.DEFAULT_PART_POWER, 1),
        replicas: this.number(flags.replicas, constants.DEFAULT_REPLICAS, 1),
        minPartHours: this.number(flags.minPartHours, constants.DEFAULT_MIN_PART_HOURS, 0),
        ports: {
          account: this.port(flags.accountPort, constants.DEFAULT_ACCOUNT_PORT),
          container: this.port(flags.containerPort, constants.DEFAULT_CONTAINER_PORT),
          object: this.port(flags.objectPort, constants.DEFAULT_OBJECT_PORT),
        },
      },
      archive: {
        ringDirectory,
        configMapName: this.string(flags.configMap, constants.DEFAULT_CONFIG_MAP_NAME),
        dataKey: this.string(flags.dataKey, constants.DEFAULT_CONFIG_MAP_DATA_KEY),
        namespace: this.configManager.getNamespaceFlag(flags.namespace),
        context: this.configManager.getStringFlag(flags.context),
        owner: this.owner(),
      },
      devicesFile: PathEx.resolve(this.string(flags.devices, constants.DEFAULT_DEVICES_FILE)),
    };

    if (!isDns1123Subdomain(config.archive.configMapName)) {
      throw new IllegalArgumentError(
        `--${flags.configMap.name} must be a valid DNS-1123 subdomain`,
        config.archive.configMapName,
      );
    }
    if (!CONFIG_MAP_KEY.test(config.archive.dataKey)) {
      throw new IllegalArgumentError(
        `--${flags.dataKey.name} must consist of alphanumeric characters, '-', '_' or '.'`,
        config.archive.dataKey,
      );
    }

    this.logger.debug('Ring command config', {config});
    return config;
  }

  private owner(): OwnerReference | undefined {
    const name: string | undefined = this.configManager.getStringFlag(flags.ownerName);
    const uid: string | undefined = this.configManager.getStringFlag(flags.ownerUid);
    if (!name && !uid) {
      return undefined;
    }
    if (!name || !uid) {
      throw new IllegalArgumentError(
        `--${flags.ownerName.name} and --${flags.ownerUid.name} must be given together`,
        {name, uid},
      );
    }

    return {
      apiVersion: this.string(flags.ownerApiVersion, constants.DEFAULT_OWNER_API_VERSION),
      kind: this.string(flags.ownerKind, constants.DEFAULT_OWNER_KIND),
      name,
      uid,
    };
  }

  /** The ring-builder runs from the ring directory, so a relative path is resolved against the current one */
  private executable(ringBuilder: string): string {
    return ringBuilder.includes(path.sep) ? PathEx.resolve(ringBuilder) : ringBuilder;
  }

  private string(flag: CommandFlag, defaultValue: string): string {
    return this.configManager.getStringFlag(flag) || defaultValue;
  }

  private number(flag: CommandFlag, defaultValue: number, minimum: number): number {
    const value: number = this.configManager.getNumberFlag(flag) ?? defaultValue;
    if (value < minimum) {
      throw new IllegalArgumentError(`--${flag.name} must be at least ${minimum}`, value);
    }
    return value;
  }

  private port(flag: CommandFlag, defaultValue: number): number {
    const value: number = this.number(flag, defaultValue, 1);
    if (value > 65_535) {
      throw new IllegalArgumentError(`--${flag.name} must be a valid port`, value);
    }
    return value;
  }
}
