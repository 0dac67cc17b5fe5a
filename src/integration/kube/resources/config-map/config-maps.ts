// SPDX-License-Identifier: Apache-2.0

import {type NamespaceName} from '../namespace/namespace-name.js';
import {type ConfigMap} from './config-map.js';
import {type OwnerReference} from './owner-reference.js';

export interface ConfigMaps {
  /**
   * Create a new config map. If the config map already exists, it will not be replaced.
   *
   * @param namespace - for the config map
   * @param name - for the config name
   * @param labels - for the config metadata
   * @param data - to contain in the config
   * @param ownerReferences - owners of the config map
   * @returns the config map stored by the server
   * @throws {ResourceCreateError} if the config map could not be created.
   * @throws {KubeApiError} if the API call fails for an unexpected reason.
   */
  create(
    namespace: NamespaceName,
    name: string,
    labels: Record<string, string>,
    data: Record<string, string>,
    ownerReferences?: OwnerReference[],
  ): Promise<ConfigMap>;

  /**
   * Read a config map
   * @param namespace - for the config map
   * @param name - for the config name
   * @throws {ResourceNotFoundError} if the config map does not exist.
   * @throws {KubeApiError} if the API call fails for an unexpected reason.
   */
  read(namespace: NamespaceName, name: string): Promise<ConfigMap>;

  /**
   * Replace an existing config map. The metadata of the given config map is sent as is, so a resource version it
   * carries makes the replace conditional on the stored object being unchanged.
   *
   * @param configMap - the complete config map to store
   * @returns the config map stored by the server
   * @throws {ResourceReplaceError} if the config map could not be replaced.
   * @throws {KubeApiError} if the API call fails for an unexpected reason.
   */
  replace(configMap: ConfigMap): Promise<ConfigMap>;

  /**
   * Check if a config map exists
   * @param namespace - for the config map
   * @param name - for the config name
   */
  exists(namespace: NamespaceName, name: string): Promise<boolean>;
}
