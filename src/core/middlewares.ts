// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {type KeeperLogger} from './logging/keeper-logger.js';
import {type ArgvStruct} from '../types/aliases.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';

@injectable()
export class Middlewares {
  private readonly logger: KeeperLogger;

  public constructor(@inject(InjectTokens.KeeperLogger) logger?: KeeperLogger) {
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  public setLoggerDevFlag(): (argv: ArgvStruct) => ArgvStruct {
    const logger = this.logger;

    /**
     * @param argv - yargs Argv
     */
    return (argv: ArgvStruct): ArgvStruct => {
      if (argv[flags.devMode.name]) {
        logger.debug(`Setting logger dev mode: ${argv[flags.devMode.name]}`);
        logger.setDevMode(argv[flags.devMode.name] === true);
      }

      return argv;
    };
  }

  /**
   * Starts a new trace id for the command about to run and logs its arguments.
   */
  public processArguments(): (argv: ArgvStruct) => ArgvStruct {
    const logger = this.logger;

    return (argv: ArgvStruct): ArgvStruct => {
      logger.nextTraceId();
      logger.debug(`Processing arguments: ${argv._.join(' ')}`, {argv});
      return argv;
    };
  }
}
