// SPDX-License-Identifier: Apache-2.0

import {KeeperError} from './errors/keeper-error.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {MissingArgumentError} from './errors/missing-argument-error.js';
import fs from 'node:fs';
import * as tar from 'tar';
import {type KeeperLogger} from './logging/keeper-logger.js';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type TarCreateFilter} from '../types/aliases.js';

@injectable()
export class Zippy {
  private readonly logger: KeeperLogger;

  public constructor(@inject(InjectTokens.KeeperLogger) logger?: KeeperLogger) {
    this.logger = patchInject(logger, InjectTokens.KeeperLogger, this.constructor.name);
  }

  /**
   * Creates a gzipped tarball of the contents of a directory, entry paths are relative to that directory.
   *
   * @param sourcePath - path to the directory
   * @param destinationPath - path to the output tar.gz file
   * @param filter - decides which entries go into the archive
   * @returns path to the output tar.gz file
   */
  public tar(sourcePath: string, destinationPath: string, filter?: TarCreateFilter): string {
    if (!sourcePath) throw new MissingArgumentError('srcPath is required');
    if (!destinationPath) throw new MissingArgumentError('destPath is required');
    if (!destinationPath.endsWith('.tar.gz')) {
      throw new MissingArgumentError('destPath must be a path to a tar.gz file');
    }

    if (!fs.existsSync(sourcePath)) throw new IllegalArgumentError('srcPath does not exists', sourcePath);

    try {
      tar.c(
        {
          gzip: true,
          file: destinationPath,
          cwd: sourcePath,
          sync: true,
          portable: true,
          filter,
        },
        ['.'],
      );
      this.logger.debug(`Created archive ${destinationPath} from ${sourcePath}`);
      return destinationPath;
    } catch (error) {
      throw new KeeperError(`failed to tar ${sourcePath}: ${error instanceof Error ? error.message : error}`, error);
    }
  }

  public untar(sourcePath: string, destinationPath: string): string {
    if (!sourcePath) throw new MissingArgumentError('srcPath is required');
    if (!destinationPath) throw new MissingArgumentError('destPath is required');

    if (!fs.existsSync(sourcePath)) throw new IllegalArgumentError('srcPath does not exists', sourcePath);
    if (!fs.existsSync(destinationPath)) {
      fs.mkdirSync(destinationPath, {recursive: true});
    }

    try {
      tar.x({
        C: destinationPath,
        file: sourcePath,
        sync: true,
      });
      this.logger.debug(`Extracted archive ${sourcePath} into ${destinationPath}`);
      return destinationPath;
    } catch (error) {
      throw new KeeperError(`failed to untar ${sourcePath}: ${error instanceof Error ? error.message : error}`, error);
    }
  }
}
