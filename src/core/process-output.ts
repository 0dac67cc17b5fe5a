// SPDX-License-Identifier: Apache-2.0

import {ProcessOutput} from 'listr2';
import {type KeeperLogger} from './logging/keeper-logger.js';

/** Uses the ringkeeper logger to handle process output from Listr2 */
export class CustomProcessOutput extends ProcessOutput {
  public constructor(private readonly logger: KeeperLogger) {
    super();
  }

  public override toStdout(chunk: string, eol = true): boolean {
    for (const line of chunk.toString().split('\n')) {
      this.logger.debug(line);
    }
    return super.toStdout(chunk, eol);
  }

  public override toStderr(chunk: string, eol = true): boolean {
    this.logger.error(chunk.toString());
    return super.toStderr(chunk, eol);
  }
}
