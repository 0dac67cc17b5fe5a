// SPDX-License-Identifier: Apache-2.0

import {color, type ListrLogger, PRESET_TIMER} from 'listr2';
import os from 'node:os';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- ringkeeper related constants ----------------------------------------------------------------
export const KEEPER_HOME_DIR = process.env.RINGKEEPER_HOME || PathEx.join(os.homedir(), '.ringkeeper');
export const KEEPER_LOGS_DIR = PathEx.join(KEEPER_HOME_DIR, 'logs');
export const KEEPER_LOG_FILE = 'ringkeeper.log';
export const KEEPER_ENV_PREFIX = 'RINGKEEPER';
export const KEEPER_MANAGED_BY = 'ringkeeper';

// -------------------- kubernetes related constants ----------------------------------------------------------------
export const DEFAULT_NAMESPACE = 'default';
export const DEFAULT_CONFIG_MAP_NAME = 'swift-rings';
export const DEFAULT_CONFIG_MAP_DATA_KEY = 'rings.tar.gz';
export const RING_CONFIG_MAP_LABELS: Record<string, string> = {
  'app.kubernetes.io/managed-by': KEEPER_MANAGED_BY,
  'app.kubernetes.io/component': 'swift-rings',
};
export const DEFAULT_OWNER_API_VERSION = 'v1';
export const DEFAULT_OWNER_KIND = 'Pod';

// -------------------- ring related constants ----------------------------------------------------------------------
export const RING_BUILDER = 'swift-ring-builder';
export const DEFAULT_RING_DIR = 'rings';
export const DEFAULT_DEVICES_FILE = 'devices';
export const BUILDER_FILE_EXTENSION = '.builder';
export const RING_FILE_EXTENSION = '.ring.gz';

/** Keeps the ConfigMap returned by the last successful fetch, it decides between create and replace on push */
export const CONFIG_MAP_RESPONSE_FILE = '.configmap.json';
export const RING_ARCHIVE_FILE = 'rings.tar.gz';

export const DEFAULT_PART_POWER = 10;
export const DEFAULT_REPLICAS = 3;
export const DEFAULT_MIN_PART_HOURS = 1;
export const DEFAULT_ACCOUNT_PORT = 6202;
export const DEFAULT_CONTAINER_PORT = 6201;
export const DEFAULT_OBJECT_PORT = 6200;

/** ring-builder exit codes */
export const RING_BUILDER_EXIT_SUCCESS = 0;
export const RING_BUILDER_EXIT_WARNING = 1;

// ------ Listr related constants ------
export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number) => duration > 100,
  format: (duration: number) => {
    if (duration > 10_000) {
      return color.red;
    }

    return color.green;
  },
};

export const LISTR_DEFAULT_RENDERER_OPTION: {
  collapseSubtasks: boolean;
  timer: typeof LISTR_DEFAULT_RENDERER_TIMER_OPTION;
  logger?: ListrLogger;
} = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
};
