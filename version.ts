// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * This file should only contain the function to get the ringkeeper version.
 */
export function getKeeperVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // beside the sources, or one level up from the build output
  for (const candidate of ['./package.json', '../package.json']) {
    const packageJsonPath: string = PathEx.resolve(__dirname, candidate);
    if (fs.existsSync(packageJsonPath)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    }
  }

  return '0.0.0';
}
