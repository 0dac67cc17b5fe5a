// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {Listr, type ListrBaseClassOptions} from 'listr2';
import {type KeeperLogger} from './logging/keeper-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {KeeperError} from './errors/keeper-error.js';
import * as constants from './constants.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type KeeperListrTask} from '../types/index.js';

@injectable()
export class CommandHandler {
  public readonly logger: KeeperLogger;

  public constructor(@inject(InjectTokens.KeeperLogger) logger?: KeeperLogger) {
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  /**
   * Runs the tasks in sequence.
   * @throws KeeperError carrying the failing task's error as cause
   */
  public async commandAction<T extends object>(
    actionTasks: KeeperListrTask<T>[],
    options: ListrBaseClassOptions<T>,
    errorString: string,
  ): Promise<T> {
    const tasks: Listr<T> = new Listr<T>([...actionTasks], options);
    try {
      return await tasks.run();
    } catch (error) {
      throw new KeeperError(`${errorString}: ${error instanceof Error ? error.message : error}`, error);
    }
  }

  /**
   * Setup home directories
   * @param directories a list of directories that need to be created in sequence
   */
  public setupHomeDirectory(directories: string[] = [constants.KEEPER_HOME_DIR, constants.KEEPER_LOGS_DIR]): string[] {
    try {
      for (const directoryPath of directories) {
        if (!fs.existsSync(directoryPath)) {
          fs.mkdirSync(directoryPath, {recursive: true});
        }
        this.logger.debug(`OK: setup directory: ${directoryPath}`);
      }
    } catch (error) {
      throw new KeeperError(`failed to create directory: ${error instanceof Error ? error.message : error}`, error);
    }

    return directories;
  }
}
