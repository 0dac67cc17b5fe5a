// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {MissingArgumentError} from './errors/missing-argument-error.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {type KeeperLogger} from './logging/keeper-logger.js';
import {Flags as flags} from '../commands/flags.js';
import {type CommandFlag} from '../types/flag-types.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {NamespaceName} from '../integration/kube/resources/namespace/namespace-name.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type Optional} from '../types/index.js';
import {getKeeperVersion} from '../../version.js';

export type FlagValue = string | number | boolean | NamespaceName;

/**
 * ConfigManager holds the command flag values of the running command.
 *
 * Values arrive through yargs, which has already applied the precedence of command line, `RINGKEEPER_*`
 * environment variables and flag defaults.
 */
@injectable()
export class ConfigManager {
  private flags: Map<string, FlagValue> = new Map();
  private version: string = '';

  private readonly logger: KeeperLogger;

  public constructor(@inject(InjectTokens.KeeperLogger) logger?: KeeperLogger) {
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);

    this.reset();
  }

  /** Reset config */
  public reset(): void {
    this.flags = new Map();
    this.version = getKeeperVersion();
  }

  /**
   * Update the config using the argv
   * @throws IllegalArgumentError if a numeric flag does not hold an integer
   */
  public update(argv: ArgvStruct): void {
    if (!argv || Object.keys(argv).length === 0) {
      return;
    }

    for (const flag of flags.allFlags) {
      const value: unknown = argv[flag.name];
      if (value === undefined || value === null || value === '') {
        continue;
      }

      switch (flag.definition.type) {
        case 'string': {
          this.setFlag(flag, `${value}`);
          break;
        }

        case 'number': {
          const parsed: number = typeof value === 'number' ? value : Number(`${value}`.trim());
          if (!Number.isInteger(parsed)) {
            throw new IllegalArgumentError(`invalid integer value for '--${flag.name}': '${value}'`, value);
          }
          this.flags.set(flag.name, parsed);
          break;
        }

        case 'boolean': {
          this.flags.set(flag.name, value === true || value === 'true'); // use comparison to enforce boolean value
          break;
        }
      }
    }

    const flagMessage: string = [...this.flags.entries()]
      .map(([key, value]) => `${key}=${flags.allFlagsMap.get(key)?.definition.dataMask ?? value}`)
      .join(', ');

    if (flagMessage) {
      this.logger.debug(`Updated config with flags: ${flagMessage}`);
    }
  }

  /** Check if a flag value is set */
  public hasFlag(flag: CommandFlag): boolean {
    return this.flags.has(flag.name);
  }

  public getStringFlag(flag: CommandFlag): Optional<string> {
    const value: Optional<FlagValue> = this.flags.get(flag.name);
    return value === undefined ? undefined : `${value}`;
  }

  public getNumberFlag(flag: CommandFlag): Optional<number> {
    const value: Optional<FlagValue> = this.flags.get(flag.name);
    return typeof value === 'number' ? value : undefined;
  }

  public getBooleanFlag(flag: CommandFlag): boolean {
    return this.flags.get(flag.name) === true;
  }

  public getNamespaceFlag(flag: CommandFlag): Optional<NamespaceName> {
    const value: Optional<FlagValue> = this.flags.get(flag.name);
    return value instanceof NamespaceName ? value : undefined;
  }

  /** Set value for the flag */
  public setFlag(flag: CommandFlag, value: FlagValue): void {
    if (!flag || !flag.name) {
      throw new MissingArgumentError('flag must have a name');
    }
    // if it is a namespace then convert it to NamespaceName
    if (flag.name === flags.namespace.name && !(value instanceof NamespaceName)) {
      this.flags.set(flag.name, NamespaceName.of(`${value}`));
      return;
    }
    this.flags.set(flag.name, value);
  }

  /** Get package version */
  public getVersion(): string {
    return this.version;
  }
}
