// SPDX-License-Identifier: Apache-2.0

import {type CommandDefinition} from '../../types/index.js';
import * as RingFlags from './flags.js';
import {BaseCommand} from '../base.js';
import {YargsCommand} from '../../core/yargs-command.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type RingCommandHandlers} from './handlers.js';

/**
 * Defines the ring lifecycle commands
 */
export class RingCommand extends BaseCommand {
  public readonly handlers: RingCommandHandlers;

  public constructor(handlers?: RingCommandHandlers) {
    super();

    this.handlers = patchInject(handlers, InjectTokens.RingCommandHandlers, this.constructor.name);
  }

  public getCommandDefinitions(): CommandDefinition[] {
    const logger = this.logger;
    return [
      new YargsCommand(
        {
          command: 'get',
          description: 'Download the rings from the ConfigMap into the ring directory',
          logger,
          handler: argv => this.handlers.get(argv),
        },
        RingFlags.GET_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'init',
          description: 'Create the ring builders that do not exist yet',
          logger,
          handler: argv => this.handlers.init(argv),
        },
        RingFlags.INIT_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'update',
          description: 'Add the devices of the devices file to every ring, or set their weight',
          logger,
          handler: argv => this.handlers.update(argv),
        },
        RingFlags.UPDATE_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'rebalance',
          description: 'Rebalance every ring',
          logger,
          handler: argv => this.handlers.rebalance(argv),
        },
        RingFlags.REBALANCE_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'forced_rebalance',
          description: 'Rebalance every ring as if min_part_hours had passed',
          logger,
          handler: argv => this.handlers.forcedRebalance(argv),
        },
        RingFlags.REBALANCE_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'push',
          description: 'Store the ring directory in the ConfigMap',
          logger,
          handler: argv => this.handlers.push(argv),
        },
        RingFlags.PUSH_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'all',
          description: 'Run get, init, update, rebalance and push in that order',
          logger,
          handler: argv => this.handlers.all(argv),
        },
        RingFlags.ALL_FLAGS,
      ),
    ];
  }
}
