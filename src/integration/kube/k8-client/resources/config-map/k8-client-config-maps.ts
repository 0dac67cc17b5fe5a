// SPDX-License-Identifier: Apache-2.0

import type http from 'node:http';
import {type CoreV1Api, HttpError, type V1ConfigMap} from '@kubernetes/client-node';
import {container} from 'tsyringe-neo';
import {type ConfigMaps} from '../../../resources/config-map/config-maps.js';
import {type ConfigMap} from '../../../resources/config-map/config-map.js';
import {type OwnerReference} from '../../../resources/config-map/owner-reference.js';
import {type NamespaceName} from '../../../resources/namespace/namespace-name.js';
import {
  ResourceCreateError,
  ResourceNotFoundError,
  ResourceReadError,
  ResourceReplaceError,
} from '../../../errors/resource-operation-errors.js';
import {ResourceType} from '../../../resources/resource-type.js';
import {ResourceOperation} from '../../../resources/resource-operation.js';
import {KubeApiResponse} from '../../../kube-api-response.js';
import {KeeperError} from '../../../../../core/errors/keeper-error.js';
import {type KeeperLogger} from '../../../../../core/logging/keeper-logger.js';
import {InjectTokens} from '../../../../../core/dependency-injection/inject-tokens.js';
import {K8ClientConfigMap} from './k8-client-config-map.js';

interface ApiResult {
  response: http.IncomingMessage;
  body?: V1ConfigMap;
}

export class K8ClientConfigMaps implements ConfigMaps {
  private readonly logger: KeeperLogger;

  public constructor(private readonly kubeClient: CoreV1Api) {
    this.logger = container.resolve<KeeperLogger>(InjectTokens.KeeperLogger);
  }

  public async create(
    namespace: NamespaceName,
    name: string,
    labels: Record<string, string>,
    data: Record<string, string>,
    ownerReferences?: OwnerReference[],
  ): Promise<ConfigMap> {
    const v1ConfigMap: V1ConfigMap = K8ClientConfigMap.toV1ConfigMap({
      namespace,
      name,
      labels,
      data,
      ownerReferences,
    });

    let result: ApiResult;
    try {
      result = await K8ClientConfigMaps.settle(this.kubeClient.createNamespacedConfigMap(namespace.name, v1ConfigMap));
    } catch (error) {
      throw new ResourceCreateError(ResourceType.CONFIG_MAP, namespace, name, error);
    }

    KubeApiResponse.check(result.response, ResourceOperation.CREATE, ResourceType.CONFIG_MAP, namespace, name);
    this.logger.info(`Created ConfigMap ${name} in namespace ${namespace}`);
    return this.toConfigMap(result, ResourceOperation.CREATE, namespace, name);
  }

  public async read(namespace: NamespaceName, name: string): Promise<ConfigMap> {
    let result: ApiResult;
    try {
      result = await K8ClientConfigMaps.settle(this.kubeClient.readNamespacedConfigMap(name, namespace.name));
    } catch (error) {
      throw new ResourceReadError(ResourceType.CONFIG_MAP, namespace, name, error);
    }

    KubeApiResponse.check(result.response, ResourceOperation.READ, ResourceType.CONFIG_MAP, namespace, name);
    return this.toConfigMap(result, ResourceOperation.READ, namespace, name);
  }

  public async replace(configMap: ConfigMap): Promise<ConfigMap> {
    const {namespace, name} = configMap;

    let result: ApiResult;
    try {
      result = await K8ClientConfigMaps.settle(
        this.kubeClient.replaceNamespacedConfigMap(name, namespace.name, K8ClientConfigMap.toV1ConfigMap(configMap)),
      );
    } catch (error) {
      throw new ResourceReplaceError(ResourceType.CONFIG_MAP, namespace, name, error);
    }

    KubeApiResponse.check(result.response, ResourceOperation.REPLACE, ResourceType.CONFIG_MAP, namespace, name);
    this.logger.info(`Replaced ConfigMap ${name} in namespace ${namespace}`);
    return this.toConfigMap(result, ResourceOperation.REPLACE, namespace, name);
  }

  public async exists(namespace: NamespaceName, name: string): Promise<boolean> {
    try {
      await this.read(namespace, name);
      return true;
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * The client rejects every non-2xx response with an HttpError, this hands the response back so that the status
   * is checked in one place.
   */
  private static async settle(
    request: Promise<{response: http.IncomingMessage; body: V1ConfigMap}>,
  ): Promise<ApiResult> {
    try {
      return await request;
    } catch (error) {
      if (error instanceof HttpError) {
        return {response: error.response};
      }
      throw error;
    }
  }

  private toConfigMap(
    result: ApiResult,
    operation: ResourceOperation,
    namespace: NamespaceName,
    name: string,
  ): ConfigMap {
    if (!result.body) {
      throw new KeeperError(`Failed to ${operation} ConfigMap ${name} in namespace ${namespace}, no body returned`);
    }
    return K8ClientConfigMap.fromV1ConfigMap(result.body);
  }
}
