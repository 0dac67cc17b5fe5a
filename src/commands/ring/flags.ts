// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../flags.js';
import {type CommandFlags} from '../../types/flag-types.js';

const ARCHIVE_FLAGS = [flags.namespace, flags.context, flags.configMap, flags.dataKey];
const OWNER_FLAGS = [flags.ownerApiVersion, flags.ownerKind, flags.ownerName, flags.ownerUid];
const PORT_FLAGS = [flags.accountPort, flags.containerPort, flags.objectPort];

export const GET_FLAGS: CommandFlags = {
  required: [],
  optional: [flags.devMode, flags.ringDirectory, ...ARCHIVE_FLAGS],
};

export const INIT_FLAGS: CommandFlags = {
  required: [],
  optional: [
    flags.devMode,
    flags.ringDirectory,
    flags.ringBuilder,
    flags.partPower,
    flags.replicas,
    flags.minPartHours,
  ],
};

export const UPDATE_FLAGS: CommandFlags = {
  required: [],
  optional: [flags.devMode, flags.ringDirectory, flags.ringBuilder, flags.devices, ...PORT_FLAGS],
};

export const REBALANCE_FLAGS: CommandFlags = {
  required: [],
  optional: [flags.devMode, flags.ringDirectory, flags.ringBuilder],
};

export const PUSH_FLAGS: CommandFlags = {
  required: [],
  optional: [flags.devMode, flags.ringDirectory, ...ARCHIVE_FLAGS, ...OWNER_FLAGS],
};

export const ALL_FLAGS: CommandFlags = {
  required: [],
  optional: [
    flags.devMode,
    flags.ringDirectory,
    flags.ringBuilder,
    flags.devices,
    flags.partPower,
    flags.replicas,
    flags.minPartHours,
    ...PORT_FLAGS,
    ...ARCHIVE_FLAGS,
    ...OWNER_FLAGS,
  ],
};
