// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {InjectTokens} from './inject-tokens.js';
import {type KeeperLogger} from '../logging/keeper-logger.js';
import {KeeperWinstonLogger} from '../logging/keeper-winston-logger.js';
import {ErrorHandler} from '../error-handler.js';
import {ConfigManager} from '../config-manager.js';
import {Middlewares} from '../middlewares.js';
import {Zippy} from '../zippy.js';
import {RingManager} from '../ring-manager.js';
import {RingArchiveStore} from '../ring-archive-store.js';
import {K8ClientFactory} from '../../integration/kube/k8-client/k8-client-factory.js';
import {RingCommandConfigs} from '../../commands/ring/configs.js';
import {RingCommandTasks} from '../../commands/ring/tasks.js';
import {RingCommandHandlers} from '../../commands/ring/handlers.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(logLevel: string = 'debug', developmentMode: boolean = false, testLogger?: KeeperLogger): void {
    if (Container.isInitialized) {
      container.resolve<KeeperLogger>(InjectTokens.KeeperLogger).debug('Container already initialized');
      return;
    }

    // KeeperLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    if (testLogger) {
      container.registerInstance(InjectTokens.KeeperLogger, testLogger);
      container.resolve<KeeperLogger>(InjectTokens.KeeperLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.KeeperLogger, {useClass: KeeperWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<KeeperLogger>(InjectTokens.KeeperLogger).debug('Using default logger');
    }

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ConfigManager, {useClass: ConfigManager}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Middlewares, {useClass: Middlewares}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.K8Factory, {useClass: K8ClientFactory}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Zippy, {useClass: Zippy}, {lifecycle: Lifecycle.Singleton});

    // Rings
    container.register(InjectTokens.RingManager, {useClass: RingManager}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.RingArchiveStore, {useClass: RingArchiveStore}, {lifecycle: Lifecycle.Singleton});

    // Commands
    container.register(
      InjectTokens.RingCommandConfigs,
      {useClass: RingCommandConfigs},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.RingCommandTasks, {useClass: RingCommandTasks}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.RingCommandHandlers,
      {useClass: RingCommandHandlers},
      {lifecycle: Lifecycle.Singleton},
    );

    container.resolve<KeeperLogger>(InjectTokens.KeeperLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(logLevel?: string, developmentMode?: boolean, testLogger?: KeeperLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, testLogger);
  }
}
