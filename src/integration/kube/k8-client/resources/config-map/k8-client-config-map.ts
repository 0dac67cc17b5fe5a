// SPDX-License-Identifier: Apache-2.0

import {V1ConfigMap, V1ObjectMeta, V1OwnerReference} from '@kubernetes/client-node';
import {type ConfigMap} from '../../../resources/config-map/config-map.js';
import {type OwnerReference} from '../../../resources/config-map/owner-reference.js';
import {NamespaceName} from '../../../resources/namespace/namespace-name.js';
import {MissingArgumentError} from '../../../../../core/errors/missing-argument-error.js';
import {DataValidationError} from '../../../../../core/errors/data-validation-error.js';

type PlainObject = Record<string, unknown>;

/**
 * The wire representation of a config map, as the API server returns it and as it is kept on disk.
 */
export interface ConfigMapObject {
  apiVersion: 'v1';
  kind: 'ConfigMap';
  metadata: {
    name: string;
    namespace: string;
    labels?: Record<string, string>;
    annotations?: Record<string, string>;
    resourceVersion?: string;
    ownerReferences?: OwnerReference[];
    finalizers?: string[];
  };
  data?: Record<string, string>;
  binaryData?: Record<string, string>;
  immutable?: boolean;
}

/**
 * The fields of a config map besides its identity, every one optional.
 */
export type ConfigMapContent = Omit<ConfigMap, 'namespace' | 'name'>;

export class K8ClientConfigMap implements ConfigMap {
  public readonly labels?: Record<string, string>;
  public readonly annotations?: Record<string, string>;
  public readonly data?: Record<string, string>;
  public readonly binaryData?: Record<string, string>;
  public readonly immutable?: boolean;
  public readonly finalizers?: string[];
  public readonly resourceVersion?: string;
  public readonly ownerReferences?: OwnerReference[];

  public constructor(
    public readonly namespace: NamespaceName,
    public readonly name: string,
    content: ConfigMapContent = {},
  ) {
    this.labels = content.labels;
    this.annotations = content.annotations;
    this.data = content.data;
    this.binaryData = content.binaryData;
    this.immutable = content.immutable;
    this.finalizers = content.finalizers;
    this.resourceVersion = content.resourceVersion;
    this.ownerReferences = content.ownerReferences;
  }

  public static fromV1ConfigMap(v1ConfigMap: V1ConfigMap): ConfigMap {
    const metadata: V1ObjectMeta | undefined = v1ConfigMap.metadata;
    if (!metadata?.name || !metadata.namespace) {
      throw new MissingArgumentError('config map metadata must carry a name and a namespace');
    }

    return new K8ClientConfigMap(NamespaceName.of(metadata.namespace), metadata.name, {
      labels: metadata.labels,
      annotations: metadata.annotations,
      data: v1ConfigMap.data,
      binaryData: v1ConfigMap.binaryData,
      immutable: v1ConfigMap.immutable,
      finalizers: metadata.finalizers,
      resourceVersion: metadata.resourceVersion,
      ownerReferences: metadata.ownerReferences?.map(reference =>
        K8ClientConfigMap.ownerReference(
          reference.apiVersion,
          reference.kind,
          reference.name,
          reference.uid,
          reference.controller,
          reference.blockOwnerDeletion,
        ),
      ),
    });
  }

  public static toV1ConfigMap(configMap: ConfigMap): V1ConfigMap {
    const v1ConfigMap: V1ConfigMap = new V1ConfigMap();
    v1ConfigMap.apiVersion = 'v1';
    v1ConfigMap.kind = 'ConfigMap';
    v1ConfigMap.data = configMap.data;
    v1ConfigMap.binaryData = configMap.binaryData;
    v1ConfigMap.immutable = configMap.immutable;

    const metadata: V1ObjectMeta = new V1ObjectMeta();
    metadata.name = configMap.name;
    metadata.namespace = configMap.namespace.name;
    metadata.labels = configMap.labels;
    metadata.annotations = configMap.annotations;
    metadata.finalizers = configMap.finalizers;
    metadata.resourceVersion = configMap.resourceVersion;
    if (configMap.ownerReferences?.length) {
      metadata.ownerReferences = configMap.ownerReferences.map(reference => {
        const v1OwnerReference: V1OwnerReference = new V1OwnerReference();
        v1OwnerReference.apiVersion = reference.apiVersion;
        v1OwnerReference.kind = reference.kind;
        v1OwnerReference.name = reference.name;
        v1OwnerReference.uid = reference.uid;
        v1OwnerReference.controller = reference.controller;
        v1OwnerReference.blockOwnerDeletion = reference.blockOwnerDeletion;
        return v1OwnerReference;
      });
    }
    v1ConfigMap.metadata = metadata;

    return v1ConfigMap;
  }

  public static toObject(configMap: ConfigMap): ConfigMapObject {
    const object: ConfigMapObject = {
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: {name: configMap.name, namespace: configMap.namespace.name},
    };
    if (configMap.labels) {
      object.metadata.labels = {...configMap.labels};
    }
    if (configMap.annotations) {
      object.metadata.annotations = {...configMap.annotations};
    }
    if (configMap.resourceVersion) {
      object.metadata.resourceVersion = configMap.resourceVersion;
    }
    if (configMap.ownerReferences?.length) {
      object.metadata.ownerReferences = configMap.ownerReferences.map(reference => ({...reference}));
    }
    if (configMap.finalizers?.length) {
      object.metadata.finalizers = [...configMap.finalizers];
    }
    if (configMap.data) {
      object.data = {...configMap.data};
    }
    if (configMap.binaryData) {
      object.binaryData = {...configMap.binaryData};
    }
    if (configMap.immutable !== undefined) {
      object.immutable = configMap.immutable;
    }
    return object;
  }

  /**
   * Reads a config map back from its wire representation.
   *
   * @param value - the parsed JSON document
   * @throws DataValidationError if the document is not a config map
   */
  public static fromObject(value: unknown): ConfigMap {
    if (!isPlainObject(value)) {
      throw new DataValidationError('config map document must be an object', 'object', value);
    }
    if (value.kind !== undefined && value.kind !== 'ConfigMap') {
      throw new DataValidationError('config map document has an unexpected kind', 'ConfigMap', value.kind);
    }

    const metadata: unknown = value.metadata;
    if (!isPlainObject(metadata)) {
      throw new DataValidationError('config map document must carry metadata', 'object', metadata);
    }
    if (typeof metadata.name !== 'string' || typeof metadata.namespace !== 'string') {
      throw new DataValidationError(
        'config map metadata must carry a name and a namespace',
        'name and namespace',
        metadata,
      );
    }

    return new K8ClientConfigMap(NamespaceName.of(metadata.namespace), metadata.name, {
      labels: K8ClientConfigMap.stringRecord('metadata.labels', metadata.labels),
      annotations: K8ClientConfigMap.stringRecord('metadata.annotations', metadata.annotations),
      data: K8ClientConfigMap.stringRecord('data', value.data),
      binaryData: K8ClientConfigMap.stringRecord('binaryData', value.binaryData),
      immutable: K8ClientConfigMap.optionalBoolean('immutable', value.immutable),
      finalizers: K8ClientConfigMap.stringList('metadata.finalizers', metadata.finalizers),
      resourceVersion: K8ClientConfigMap.optionalString('metadata.resourceVersion', metadata.resourceVersion),
      ownerReferences: K8ClientConfigMap.ownerReferences(metadata.ownerReferences),
    });
  }

  private static stringRecord(field: string, value: unknown): Record<string, string> | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isPlainObject(value)) {
      throw new DataValidationError(`${field} must be an object`, 'object', value);
    }

    const record: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') {
        throw new DataValidationError(`${field}.${key} must be a string`, 'string', entry);
      }
      record[key] = entry;
    }
    return record;
  }

  private static optionalString(field: string, value: unknown): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new DataValidationError(`${field} must be a string`, 'string', value);
    }
    return value;
  }

  private static optionalBoolean(field: string, value: unknown): boolean | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new DataValidationError(`${field} must be a boolean`, 'boolean', value);
    }
    return value;
  }

  private static stringList(field: string, value: unknown): string[] | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      throw new DataValidationError(`${field} must be an array`, 'array', value);
    }
    return value.map((entry: unknown): string => {
      if (typeof entry !== 'string') {
        throw new DataValidationError(`${field} must hold strings`, 'string', entry);
      }
      return entry;
    });
  }

  private static ownerReferences(value: unknown): OwnerReference[] | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value)) {
      throw new DataValidationError('metadata.ownerReferences must be an array', 'array', value);
    }

    return value.map((entry: unknown): OwnerReference => {
      if (
        !isPlainObject(entry) ||
        typeof entry.apiVersion !== 'string' ||
        typeof entry.kind !== 'string' ||
        typeof entry.name !== 'string' ||
        typeof entry.uid !== 'string'
      ) {
        throw new DataValidationError('invalid owner reference', 'apiVersion, kind, name and uid', entry);
      }
      return K8ClientConfigMap.ownerReference(
        entry.apiVersion,
        entry.kind,
        entry.name,
        entry.uid,
        typeof entry.controller === 'boolean' ? entry.controller : undefined,
        typeof entry.blockOwnerDeletion === 'boolean' ? entry.blockOwnerDeletion : undefined,
      );
    });
  }

  /** The optional flags are left out when unset so that references compare equal after a round trip */
  private static ownerReference(
    apiVersion: string,
    kind: string,
    name: string,
    uid: string,
    controller?: boolean,
    blockOwnerDeletion?: boolean,
  ): OwnerReference {
    return {
      apiVersion,
      kind,
      name,
      uid,
      ...(controller === undefined ? {} : {controller}),
      ...(blockOwnerDeletion === undefined ? {} : {blockOwnerDeletion}),
    };
  }
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
