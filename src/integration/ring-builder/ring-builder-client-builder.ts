// SPDX-License-Identifier: Apache-2.0

import {type RingBuilderClient} from './ring-builder-client.js';
import {DefaultRingBuilderClient} from './impl/default-ring-builder-client.js';
import {type KeeperLogger} from '../../core/logging/keeper-logger.js';
import {RING_BUILDER} from '../../core/constants.js';

export class RingBuilderClientBuilder {
  private _executable: string = RING_BUILDER;
  private _logger?: KeeperLogger;

  /**
   * @param executable - name or path of the ring-builder executable, looked up on the PATH when it has no directory
   */
  public executable(executable: string): RingBuilderClientBuilder {
    this._executable = executable;
    return this;
  }

  public logger(logger: KeeperLogger): RingBuilderClientBuilder {
    this._logger = logger;
    return this;
  }

  public build(): RingBuilderClient {
    return new DefaultRingBuilderClient(this._executable, this._logger);
  }
}
