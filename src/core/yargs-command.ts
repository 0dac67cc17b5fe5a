// SPDX-License-Identifier: Apache-2.0

import {type Argv, type CommandModule} from 'yargs';
import {Flags as commandFlags} from '../commands/flags.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {KeeperError} from './errors/keeper-error.js';
import {type KeeperLogger} from './logging/keeper-logger.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type ArgvStruct} from '../types/aliases.js';

export type CommandHandlerFunction = (argv: ArgvStruct) => Promise<boolean>;

/**
 * A yargs command module that sets the command's flags and runs its handler.
 */
export class YargsCommand implements CommandModule {
  public readonly command: string;
  public readonly describe: string;

  private readonly flags: CommandFlags;
  private readonly logger: KeeperLogger;
  private readonly commandHandler: CommandHandlerFunction;

  public constructor(
    options: {command: string; description: string; logger: KeeperLogger; handler: CommandHandlerFunction},
    flags: CommandFlags,
  ) {
    const {command, description, logger, handler} = options;

    if (!command) {
      throw new IllegalArgumentError("A string is required as the 'command' property", command);
    }
    if (!description) {
      throw new IllegalArgumentError("A string is required as the 'description' property", description);
    }
    if (!flags.required) {
      throw new IllegalArgumentError("An array of CommandFlag is required as the 'required' property", flags);
    }
    if (!flags.optional) {
      throw new IllegalArgumentError("An array of CommandFlag is required as the 'optional' property", flags);
    }

    this.command = command;
    this.describe = description;
    this.flags = flags;
    this.logger = logger;
    this.commandHandler = handler;
  }

  public builder = (y: Argv): Argv => {
    commandFlags.setRequiredCommandFlags(y, ...this.flags.required);
    commandFlags.setOptionalCommandFlags(y, ...this.flags.optional);
    return y;
  };

  public handler = async (argv: ArgvStruct): Promise<void> => {
    this.logger.info(`==== Running '${this.command}' ===`);
    this.logger.info(JSON.stringify(argv));

    let succeeded: boolean;
    try {
      succeeded = await this.commandHandler(argv);
    } catch (error) {
      throw new KeeperError(`${this.command} failed: ${error instanceof Error ? error.message : error}`, error);
    }

    this.logger.info(`==== Finished running '${this.command}' ====`);
    if (!succeeded) {
      throw new KeeperError(`${this.command} failed, expected returned value to be true`);
    }
  };
}
