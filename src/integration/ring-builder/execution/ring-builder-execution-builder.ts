// SPDX-License-Identifier: Apache-2.0

import {RingBuilderExecution} from './ring-builder-execution.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type KeeperLogger} from '../../../core/logging/keeper-logger.js';
import {MissingArgumentError} from '../../../core/errors/missing-argument-error.js';

/**
 * A builder for creating a ring-builder command execution.
 *
 * The command line is `<executable> <builder file> <subcommand> [--name value]... [positional]...`.
 */
export class RingBuilderExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL = 'value must not be null';

  private readonly logger: KeeperLogger;

  /**
   * The builder file the command operates on, relative to the working directory.
   */
  private _builderFile?: string;

  private _subcommand?: string;

  /**
   * The arguments to be passed to the ring-builder, in insertion order.
   */
  private readonly _arguments: Map<string, string> = new Map();

  private readonly _positionals: string[] = [];

  private readonly _environmentVariables: Map<string, string> = new Map();

  private _workingDirectory: string;

  /**
   * @param executable - the name or path of the ring-builder executable
   * @param logger - defaults to the container's logger
   */
  public constructor(
    private readonly executable: string,
    logger?: KeeperLogger,
  ) {
    if (!executable) {
      throw new MissingArgumentError('executable must not be null');
    }
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
    this._workingDirectory = process.cwd();
  }

  public builderFile(builderFile: string): RingBuilderExecutionBuilder {
    if (!builderFile) {
      throw new MissingArgumentError('builderFile must not be null');
    }
    this._builderFile = builderFile;
    return this;
  }

  public subcommand(subcommand: string): RingBuilderExecutionBuilder {
    if (!subcommand) {
      throw new MissingArgumentError('subcommand must not be null');
    }
    this._subcommand = subcommand;
    return this;
  }

  /**
   * Adds a `--name value` argument.
   * @param name the name of the argument, without leading dashes
   * @param value the value of the argument
   * @returns this builder
   */
  public argument(name: string, value: string): RingBuilderExecutionBuilder {
    if (!name) {
      throw new MissingArgumentError(RingBuilderExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new MissingArgumentError(RingBuilderExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._arguments.set(name, value);
    return this;
  }

  public positional(value: string): RingBuilderExecutionBuilder {
    if (!value) {
      throw new MissingArgumentError(RingBuilderExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._positionals.push(value);
    return this;
  }

  public environmentVariable(name: string, value: string): RingBuilderExecutionBuilder {
    if (!name) {
      throw new MissingArgumentError(RingBuilderExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new MissingArgumentError(RingBuilderExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._environmentVariables.set(name, value);
    return this;
  }

  public workingDirectory(workingDirectoryPath: string): RingBuilderExecutionBuilder {
    if (!workingDirectoryPath) {
      throw new MissingArgumentError('workingDirectoryPath must not be null');
    }
    this._workingDirectory = workingDirectoryPath;
    return this;
  }

  /**
   * Starts the ring-builder process.
   * @returns the running execution
   */
  public build(): RingBuilderExecution {
    const command: string[] = this.buildCommand();
    const environment: Record<string, string> = {};
    for (const [key, value] of this._environmentVariables.entries()) {
      environment[key] = value;
    }

    return new RingBuilderExecution(command, this._workingDirectory, environment);
  }

  /**
   * Builds the command array for the ring-builder execution.
   * @returns the command array, the executable first
   */
  public buildCommand(): string[] {
    if (!this._builderFile) {
      throw new MissingArgumentError('builder file is required');
    }
    if (!this._subcommand) {
      throw new MissingArgumentError('subcommand is required');
    }

    const command: string[] = [this.executable, this._builderFile, this._subcommand];
    for (const [key, value] of this._arguments.entries()) {
      command.push(`--${key}`, value);
    }
    command.push(...this._positionals);

    this.logger.debug(`ring-builder command: ${command.join(' ')}`, {cwd: this._workingDirectory});

    return command;
  }
}
