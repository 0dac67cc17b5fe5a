// SPDX-License-Identifier: Apache-2.0

import {type ConfigMaps} from './resources/config-map/config-maps.js';
import {type NamespaceName} from './resources/namespace/namespace-name.js';

export interface K8 {
  /**
   * Fluent accessor for reading and manipulating config maps.
   * @returns an object instance providing config map operations
   */
  configMaps(): ConfigMaps;

  /**
   * The namespace of the kubeconfig context in use, undefined when the context names none.
   */
  defaultNamespace(): NamespaceName | undefined;
}
