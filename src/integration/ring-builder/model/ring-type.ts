// SPDX-License-Identifier: Apache-2.0

import {BUILDER_FILE_EXTENSION, RING_FILE_EXTENSION} from '../../../core/constants.js';

/**
 * The rings of an object store cluster, one per storage server kind.
 */
export enum RingType {
  ACCOUNT = 'account',
  CONTAINER = 'container',
  OBJECT = 'object',
}

export const RING_TYPES: readonly RingType[] = [RingType.ACCOUNT, RingType.CONTAINER, RingType.OBJECT];

export function builderFileName(ringType: RingType): string {
  return `${ringType}${BUILDER_FILE_EXTENSION}`;
}

export function ringFileName(ringType: RingType): string {
  return `${ringType}${RING_FILE_EXTENSION}`;
}
