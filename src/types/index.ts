// SPDX-License-Identifier: Apache-2.0

import {type ListrDefaultRenderer, type ListrSimpleRenderer, type ListrTask} from 'listr2';
import {type CommandModule} from 'yargs';

// NOTE: DO NOT add any ringkeeper imports in this file to avoid circular dependencies

/**
 * Generic type for representing optional types
 */
export type Optional<T> = T | undefined;

export type KeeperListrTask<T> = ListrTask<T, ListrDefaultRenderer, ListrSimpleRenderer>;

export type CommandDefinition = CommandModule;
