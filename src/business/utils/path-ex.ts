// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

/**
 * Path helpers used wherever a ring directory, a builder file or a devices file path is put together.
 */
export class PathEx {
  /**
   * Joins and normalizes path segments, for building a path below a directory that is already known.
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the segments to an absolute path against the current working directory.
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }
}
