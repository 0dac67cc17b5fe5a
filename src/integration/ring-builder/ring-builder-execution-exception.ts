// SPDX-License-Identifier: Apache-2.0

import {KeeperError} from '../../core/errors/keeper-error.js';

/**
 * Exception thrown when the execution of the ring-builder executable fails.
 */
export class RingBuilderExecutionException extends KeeperError {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE = 'Execution of the ring-builder command failed with exit code: %d';

  /**
   * @param exitCode - the non-zero exit code returned by the ring-builder, -1 when it could not be started
   * @param message - detail message, the default message when empty
   * @param stdOut - the standard output of the ring-builder
   * @param stdErr - the standard error of the ring-builder
   * @param cause - the error raised when the process could not be started
   */
  public constructor(
    private readonly exitCode: number,
    message: string = '',
    private readonly stdOut: string = '',
    private readonly stdErr: string = '',
    cause: unknown = {},
  ) {
    super(message || RingBuilderExecutionException.DEFAULT_MESSAGE.replace('%d', exitCode.toString()), cause, {
      exitCode,
      stdOut,
      stdErr,
    });
  }

  public getExitCode(): number {
    return this.exitCode;
  }

  public getStdOut(): string {
    return this.stdOut;
  }

  public getStdErr(): string {
    return this.stdErr;
  }

  public override toString(): string {
    return (
      `RingBuilderExecutionException{message=${this.message}, exitCode=${this.exitCode}, ` +
      `stdOut='${this.stdOut}', stdErr='${this.stdErr}'}`
    );
  }
}
