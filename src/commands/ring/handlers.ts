// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import * as constants from '../../core/constants.js';
import {CommandHandler} from '../../core/command-handler.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type KeeperLogger} from '../../core/logging/keeper-logger.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type KeeperListrTask} from '../../types/index.js';
import {type RingCommandTasks} from './tasks.js';
import {type RingCommandConfig, type RingCommandConfigs, type RingCommandContext} from './configs.js';

@injectable()
export class RingCommandHandlers extends CommandHandler {
  private readonly tasks: RingCommandTasks;
  private readonly configs: RingCommandConfigs;

  public constructor(
    @inject(InjectTokens.RingCommandTasks) tasks?: RingCommandTasks,
    @inject(InjectTokens.RingCommandConfigs) configs?: RingCommandConfigs,
    @inject(InjectTokens.KeeperLogger) logger?: KeeperLogger,
  ) {
    super(logger);

    this.tasks = patchInject(tasks, InjectTokens.RingCommandTasks, this.constructor.name);
    this.configs = patchInject(configs, InjectTokens.RingCommandConfigs, this.constructor.name);
  }

  /** Download the ConfigMap and extract the rings into the ring directory */
  public async get(argv: ArgvStruct): Promise<boolean> {
    await this.run(argv, [this.tasks.fetchRings()], 'Error fetching rings');
    return true;
  }

  public async init(argv: ArgvStruct): Promise<boolean> {
    await this.run(argv, [this.tasks.initRings()], 'Error creating ring builders');
    return true;
  }

  public async update(argv: ArgvStruct): Promise<boolean> {
    await this.run(argv, [this.tasks.updateDevices()], 'Error applying devices');
    return true;
  }

  public async rebalance(argv: ArgvStruct): Promise<boolean> {
    await this.run(argv, [this.tasks.rebalanceRings()], 'Error rebalancing rings');
    return true;
  }

  public async forcedRebalance(argv: ArgvStruct): Promise<boolean> {
    await this.run(argv, [this.tasks.forcedRebalanceRings()], 'Error force rebalancing rings');
    return true;
  }

  public async push(argv: ArgvStruct): Promise<boolean> {
    await this.run(argv, [this.tasks.pushRings()], 'Error pushing rings');
    return true;
  }

  /**
   * - Fetch the stored rings.
   * - Create the builders that are missing.
   * - Apply the devices file and rebalance.
   * - Push the rings back.
   */
  public async all(argv: ArgvStruct): Promise<boolean> {
    await this.run(
      argv,
      [
        this.tasks.fetchRings(),
        this.tasks.initRings(),
        this.tasks.updateDevices(),
        this.tasks.rebalanceRings(),
        this.tasks.pushRings(),
      ],
      'Error running ring lifecycle',
    );
    return true;
  }

  private async run(
    argv: ArgvStruct,
    tasks: KeeperListrTask<RingCommandContext>[],
    errorString: string,
  ): Promise<RingCommandContext> {
    const config: RingCommandConfig = this.configs.configBuilder(argv);
    this.setupHomeDirectory();

    return this.commandAction<RingCommandContext>(
      tasks,
      {
        concurrent: false,
        ctx: {config},
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      errorString,
    );
  }
}
