// SPDX-License-Identifier: Apache-2.0

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string | number;
  alias?: string;
  type: 'string' | 'number' | 'boolean';
  dataMask?: string;
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}
