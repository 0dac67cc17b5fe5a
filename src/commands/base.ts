// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import {type CommandDefinition} from '../types/index.js';
import {type KeeperLogger} from '../core/logging/keeper-logger.js';
import {type ConfigManager} from '../core/config-manager.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';

export abstract class BaseCommand {
  protected readonly logger: KeeperLogger;
  public readonly configManager: ConfigManager;

  public constructor(
    @inject(InjectTokens.KeeperLogger) logger?: KeeperLogger,
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
  ) {
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
  }

  /**
   * The yargs commands this command group contributes to the root command.
   */
  public abstract getCommandDefinitions(): CommandDefinition[];
}
