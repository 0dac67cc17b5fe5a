// SPDX-License-Identifier: Apache-2.0

import {type Stats} from 'node:fs';
import {type ReadEntry} from 'tar';
import {type Arguments} from 'yargs';

export type TarCreateFilter = (path: string, entry: Stats | ReadEntry) => boolean;

export type ArgvStruct = Arguments;
