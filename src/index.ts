// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import {ListrLogger} from 'listr2';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import {CustomProcessOutput} from './core/process-output.js';
import {type KeeperLogger} from './core/logging/keeper-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type Middlewares} from './core/middlewares.js';
import {type ConfigManager} from './core/config-manager.js';
import {KeeperError} from './core/errors/keeper-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {SilentBreak} from './core/errors/silent-break.js';

export async function main(argv: string[], context?: {logger?: KeeperLogger}): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : error}`, error);
    throw new KeeperError('Error initializing container', error);
  }

  const logger: KeeperLogger = container.resolve<KeeperLogger>(InjectTokens.KeeperLogger);

  if (context) {
    // save the logger so that the entrypoint can report completion through it
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason, promise) => {
    logger.showUserError(
      new KeeperError(`Unhandled Rejection at: ${JSON.stringify(promise)}, reason: ${JSON.stringify(reason)}`),
    );
  });
  process.on('uncaughtException', (error, origin) => {
    logger.showUserError(new KeeperError(`Uncaught Exception: ${error}, origin: ${origin}`, error));
  });

  logger.debug('Initializing ringkeeper');
  constants.LISTR_DEFAULT_RENDERER_OPTION.logger = new ListrLogger({processOutput: new CustomProcessOutput(logger)});
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    const configManager: ConfigManager = container.resolve<ConfigManager>(InjectTokens.ConfigManager);
    logger.showUser(chalk.cyan('\n******************************* ringkeeper ***************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(configManager.getVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing middlewares');
  const middlewares: Middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('ringkeeper')
    .usage('Usage:\n  ringkeeper <command> [options]')
    .env(constants.KEEPER_ENV_PREFIX)
    // RINGKEEPER_HOME shares the flag prefix, strict parsing must not take it for an unknown argument
    .option('home', {type: 'string', hidden: true})
    .alias('h', 'help')
    .version(false)
    .command(commands.Initialize())
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(
      [middlewares.setLoggerDevFlag(), middlewares.processArguments()],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

  rootCmd.fail(message => {
    // errors thrown by a command handler reject parseAsync and reach the entrypoint's error handler
    if (message) {
      logger.showUser(chalk.red(message));
      rootCmd.showHelp();
      process.exitCode = 1;
      throw new SilentBreak(message);
    }
  });

  logger.debug('Setting up flags');
  flags.setOptionalCommandFlags(rootCmd, flags.devMode);

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
