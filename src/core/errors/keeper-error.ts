// SPDX-License-Identifier: Apache-2.0

export class KeeperError extends Error {
  public readonly statusCode?: number;

  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    cause: unknown = {},
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
    this.statusCode = KeeperError.statusCodeOf(cause);
    Error.captureStackTrace(this, this.constructor);
    if (cause instanceof Error) {
      this.stack += `\nCaused by: ${cause.stack}`;
    }
  }

  private static statusCodeOf(cause: unknown): number | undefined {
    if (typeof cause === 'object' && cause !== null && 'statusCode' in cause && typeof cause.statusCode === 'number') {
      return cause.statusCode;
    }
    return undefined;
  }
}
