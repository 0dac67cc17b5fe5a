// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {KubeApiResponse} from '../../../../src/integration/kube/kube-api-response.js';
import {KubeApiError} from '../../../../src/integration/kube/errors/kube-api-error.js';
import {ResourceNotFoundError} from '../../../../src/integration/kube/errors/resource-operation-errors.js';
import {ResourceOperation} from '../../../../src/integration/kube/resources/resource-operation.js';
import {ResourceType} from '../../../../src/integration/kube/resources/resource-type.js';
import {NamespaceName} from '../../../../src/integration/kube/resources/namespace/namespace-name.js';

describe('KubeApiResponse', () => {
  const namespace = NamespaceName.of('storage');

  function check(statusCode?: number): void {
    KubeApiResponse.check({statusCode}, ResourceOperation.READ, ResourceType.CONFIG_MAP, namespace, 'swift-rings');
  }

  it('should accept 200, 201 and 202', () => {
    expect(() => check(200)).not.to.throw();
    expect(() => check(201)).not.to.throw();
    expect(() => check(202)).not.to.throw();
  });

  it('should raise a not found error for 404', () => {
    expect(() => check(404)).to.throw(
      ResourceNotFoundError,
      "failed to read ConfigMap 'swift-rings' in namespace 'storage'",
    );
  });

  it('should raise an API error for other failing statuses', () => {
    expect(() => check(409)).to.throw(
      KubeApiError,
      "failed to read ConfigMap 'swift-rings' in namespace 'storage', statusCode: 409",
    );
    try {
      check(500);
      expect.fail('expected an error');
    } catch (error) {
      expect(error).to.be.instanceof(KubeApiError);
      if (error instanceof KubeApiError) {
        expect(error.httpStatusCode).to.equal(500);
        expect(error.meta).to.deep.equal({
          resourceType: 'ConfigMap',
          resourceOperation: 'read',
          namespace: 'storage',
          name: 'swift-rings',
          statusCode: 500,
        });
      }
    }
  });

  it('should treat a missing status as a server error', () => {
    expect(() => check()).to.throw(KubeApiError, 'statusCode: 500');
  });
});
