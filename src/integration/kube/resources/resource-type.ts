// SPDX-License-Identifier: Apache-2.0

export enum ResourceType {
  CONFIG_MAP = 'ConfigMap',
}
