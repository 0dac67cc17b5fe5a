// SPDX-License-Identifier: Apache-2.0

import {type NamespaceName} from '../namespace/namespace-name.js';
import {type OwnerReference} from './owner-reference.js';

export interface ConfigMap {
  /**
   * The namespace of the config map
   */
  readonly namespace: NamespaceName;

  /**
   * The name of the config map
   */
  readonly name: string;

  /**
   * The labels of the config map
   */
  readonly labels?: Record<string, string>;

  readonly annotations?: Record<string, string>;

  /**
   * The data of the config map
   */
  readonly data?: Record<string, string>;

  /**
   * Base64 encoded binary values, kept apart from `data` by the API server
   */
  readonly binaryData?: Record<string, string>;

  readonly immutable?: boolean;

  readonly finalizers?: string[];

  /**
   * The version the server assigned to the stored object, a replace carrying it fails if the object changed since
   */
  readonly resourceVersion?: string;

  /**
   * The owners of the config map
   */
  readonly ownerReferences?: OwnerReference[];
}
