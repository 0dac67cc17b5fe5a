// SPDX-License-Identifier: Apache-2.0

import type http from 'node:http';
import {StatusCodes} from 'http-status-codes';
import {type ResourceOperation} from './resources/resource-operation.js';
import {type ResourceType} from './resources/resource-type.js';
import {type NamespaceName} from './resources/namespace/namespace-name.js';
import {ResourceNotFoundError} from './errors/resource-operation-errors.js';
import {KubeApiError} from './errors/kube-api-error.js';

type StatusResponse = Pick<http.IncomingMessage, 'statusCode'>;

/**
 * Turns the status of an API server response into the errors the kube layer raises.
 * A response without a status counts as a server error.
 */
export class KubeApiResponse {
  private constructor() {}

  /**
   * @throws ResourceNotFoundError when the status is 404
   * @throws KubeApiError when the status is above 202
   */
  public static check(
    response: StatusResponse,
    resourceOperation: ResourceOperation,
    resourceType: ResourceType,
    namespace: NamespaceName,
    name: string,
  ): void {
    const statusCode: number = KubeApiResponse.statusOf(response);
    if (statusCode === StatusCodes.NOT_FOUND) {
      throw new ResourceNotFoundError(resourceOperation, resourceType, namespace, name);
    }
    if (statusCode <= StatusCodes.ACCEPTED) {
      return;
    }

    throw new KubeApiError(
      `failed to ${resourceOperation} ${resourceType} '${name}' in namespace '${namespace}'`,
      statusCode,
      undefined,
      {resourceType, resourceOperation, namespace: namespace.name, name},
    );
  }

  private static statusOf(response: StatusResponse): number {
    return response.statusCode || StatusCodes.INTERNAL_SERVER_ERROR;
  }
}
