// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  KeeperLogger: Symbol.for('KeeperLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ConfigManager: Symbol.for('ConfigManager'),
  Middlewares: Symbol.for('Middlewares'),
  K8Factory: Symbol.for('K8Factory'),
  Zippy: Symbol.for('Zippy'),
  RingManager: Symbol.for('RingManager'),
  RingArchiveStore: Symbol.for('RingArchiveStore'),
  RingCommandConfigs: Symbol.for('RingCommandConfigs'),
  RingCommandTasks: Symbol.for('RingCommandTasks'),
  RingCommandHandlers: Symbol.for('RingCommandHandlers'),
};
