// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';
import * as constants from '../core/constants.js';
import {type CommandFlag} from '../types/flag-types.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setRequiredCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        alias: flag.definition.alias,
        type: flag.definition.type,
        demandOption: true,
      });
    }
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   */
  public static setOptionalCommandFlags(y: Argv, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      let defaultValue = flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue;
      defaultValue = defaultValue && flag.definition.dataMask ? flag.definition.dataMask : defaultValue;
      y.option(flag.name, {
        describe: flag.definition.describe,
        alias: flag.definition.alias,
        type: flag.definition.type,
        default: defaultValue,
      });
    }
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly namespace: CommandFlag = {
    constName: 'namespace',
    name: 'namespace',
    definition: {
      describe: 'Namespace of the ConfigMap, defaults to the namespace of the kube context',
      alias: 'n',
      type: 'string',
    },
  };

  public static readonly context: CommandFlag = {
    constName: 'context',
    name: 'context',
    definition: {
      describe: 'The kubeconfig context to use, defaults to the current context',
      type: 'string',
    },
  };

  public static readonly configMap: CommandFlag = {
    constName: 'configMap',
    name: 'config-map',
    definition: {
      describe: 'Name of the ConfigMap that stores the rings',
      defaultValue: constants.DEFAULT_CONFIG_MAP_NAME,
      type: 'string',
    },
  };

  public static readonly dataKey: CommandFlag = {
    constName: 'dataKey',
    name: 'data-key',
    definition: {
      describe: 'ConfigMap key holding the base64 encoded ring archive',
      defaultValue: constants.DEFAULT_CONFIG_MAP_DATA_KEY,
      type: 'string',
    },
  };

  public static readonly ringDirectory: CommandFlag = {
    constName: 'ringDirectory',
    name: 'ring-dir',
    definition: {
      describe: 'Local directory holding the builder and ring files',
      defaultValue: constants.DEFAULT_RING_DIR,
      type: 'string',
    },
  };

  public static readonly devices: CommandFlag = {
    constName: 'devices',
    name: 'devices',
    definition: {
      describe: 'Devices file, one "<region> <zone> <host> <device> <weight>" entry per line',
      defaultValue: constants.DEFAULT_DEVICES_FILE,
      type: 'string',
    },
  };

  public static readonly partPower: CommandFlag = {
    constName: 'partPower',
    name: 'part-power',
    definition: {
      describe: 'Partition power of new rings, the ring has 2^part-power partitions',
      defaultValue: constants.DEFAULT_PART_POWER,
      type: 'number',
    },
  };

  public static readonly replicas: CommandFlag = {
    constName: 'replicas',
    name: 'replicas',
    definition: {
      describe: 'Number of replicas of each partition in new rings',
      defaultValue: constants.DEFAULT_REPLICAS,
      type: 'number',
    },
  };

  public static readonly minPartHours: CommandFlag = {
    constName: 'minPartHours',
    name: 'min-part-hours',
    definition: {
      describe: 'Hours before a partition of a new ring may be moved again',
      defaultValue: constants.DEFAULT_MIN_PART_HOURS,
      type: 'number',
    },
  };

  public static readonly accountPort: CommandFlag = {
    constName: 'accountPort',
    name: 'account-port',
    definition: {
      describe: 'Port of the account servers',
      defaultValue: constants.DEFAULT_ACCOUNT_PORT,
      type: 'number',
    },
  };

  public static readonly containerPort: CommandFlag = {
    constName: 'containerPort',
    name: 'container-port',
    definition: {
      describe: 'Port of the container servers',
      defaultValue: constants.DEFAULT_CONTAINER_PORT,
      type: 'number',
    },
  };

  public static readonly objectPort: CommandFlag = {
    constName: 'objectPort',
    name: 'object-port',
    definition: {
      describe: 'Port of the object servers',
      defaultValue: constants.DEFAULT_OBJECT_PORT,
      type: 'number',
    },
  };

  public static readonly ringBuilder: CommandFlag = {
    constName: 'ringBuilder',
    name: 'ring-builder',
    definition: {
      describe: 'Name or path of the swift-ring-builder executable',
      defaultValue: constants.RING_BUILDER,
      type: 'string',
    },
  };

  public static readonly ownerApiVersion: CommandFlag = {
    constName: 'ownerApiVersion',
    name: 'owner-api-version',
    definition: {
      describe: 'API version of the object owning a newly created ConfigMap',
      defaultValue: constants.DEFAULT_OWNER_API_VERSION,
      type: 'string',
    },
  };

  public static readonly ownerKind: CommandFlag = {
    constName: 'ownerKind',
    name: 'owner-kind',
    definition: {
      describe: 'Kind of the object owning a newly created ConfigMap',
      defaultValue: constants.DEFAULT_OWNER_KIND,
      type: 'string',
    },
  };

  public static readonly ownerName: CommandFlag = {
    constName: 'ownerName',
    name: 'owner-name',
    definition: {
      describe: 'Name of the object owning a newly created ConfigMap, no owner is set without it',
      type: 'string',
    },
  };

  public static readonly ownerUid: CommandFlag = {
    constName: 'ownerUid',
    name: 'owner-uid',
    definition: {
      describe: 'UID of the object owning a newly created ConfigMap, no owner is set without it',
      type: 'string',
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.accountPort,
    Flags.configMap,
    Flags.containerPort,
    Flags.context,
    Flags.dataKey,
    Flags.devMode,
    Flags.devices,
    Flags.minPartHours,
    Flags.namespace,
    Flags.objectPort,
    Flags.ownerApiVersion,
    Flags.ownerKind,
    Flags.ownerName,
    Flags.ownerUid,
    Flags.partPower,
    Flags.replicas,
    Flags.ringBuilder,
    Flags.ringDirectory,
  ];

  public static readonly allFlagsMap = new Map(Flags.allFlags.map(f => [f.name, f]));
}
