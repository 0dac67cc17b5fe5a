// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {V1ConfigMap} from '@kubernetes/client-node';
import {K8ClientConfigMap} from '../../../../src/integration/kube/k8-client/resources/config-map/k8-client-config-map.js';
import {NamespaceName} from '../../../../src/integration/kube/resources/namespace/namespace-name.js';
import {type ConfigMap} from '../../../../src/integration/kube/resources/config-map/config-map.js';
import {DataValidationError} from '../../../../src/core/errors/data-validation-error.js';
import {MissingArgumentError} from '../../../../src/core/errors/missing-argument-error.js';

describe('K8ClientConfigMap', () => {
  const configMap: ConfigMap = {
    namespace: NamespaceName.of('storage'),
    name: 'swift-rings',
    labels: {'app.kubernetes.io/managed-by': 'ringkeeper'},
    data: {'rings.tar.gz': 'H4sI'},
    resourceVersion: '7',
    ownerReferences: [{apiVersion: 'v1', kind: 'Pod', name: 'ring-job', uid: 'test-uid', controller: true}],
  };

  describe('toV1ConfigMap', () => {
    it('should carry the metadata and data', () => {
      const v1ConfigMap = K8ClientConfigMap.toV1ConfigMap(configMap);
      expect(v1ConfigMap.apiVersion).to.equal('v1');
      expect(v1ConfigMap.kind).to.equal('ConfigMap');
      expect(v1ConfigMap.metadata?.name).to.equal('swift-rings');
      expect(v1ConfigMap.metadata?.namespace).to.equal('storage');
      expect(v1ConfigMap.metadata?.resourceVersion).to.equal('7');
      expect(v1ConfigMap.metadata?.labels).to.deep.equal({'app.kubernetes.io/managed-by': 'ringkeeper'});
      expect(v1ConfigMap.metadata?.ownerReferences?.[0].uid).to.equal('test-uid');
      expect(v1ConfigMap.metadata?.ownerReferences?.[0].controller).to.be.true;
      expect(v1ConfigMap.data).to.deep.equal({'rings.tar.gz': 'H4sI'});
    });

    it('should leave out empty owner references', () => {
      const v1ConfigMap = K8ClientConfigMap.toV1ConfigMap({...configMap, ownerReferences: []});
      expect(v1ConfigMap.metadata?.ownerReferences).to.be.undefined;
    });
  });

  describe('fromV1ConfigMap', () => {
    it('should read the metadata and data', () => {
      const read = K8ClientConfigMap.fromV1ConfigMap(K8ClientConfigMap.toV1ConfigMap(configMap));
      expect(read.namespace.equals(configMap.namespace)).to.be.true;
      expect(read.name).to.equal('swift-rings');
      expect(read.resourceVersion).to.equal('7');
      expect(read.ownerReferences).to.deep.equal(configMap.ownerReferences);
    });

    it('should require a name and a namespace', () => {
      expect(() => K8ClientConfigMap.fromV1ConfigMap(new V1ConfigMap())).to.throw(MissingArgumentError);
    });
  });

  describe('toObject', () => {
    it('should produce the wire document', () => {
      expect(K8ClientConfigMap.toObject(configMap)).to.deep.equal({
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: {
          name: 'swift-rings',
          namespace: 'storage',
          labels: {'app.kubernetes.io/managed-by': 'ringkeeper'},
          resourceVersion: '7',
          ownerReferences: [{apiVersion: 'v1', kind: 'Pod', name: 'ring-job', uid: 'test-uid', controller: true}],
        },
        data: {'rings.tar.gz': 'H4sI'},
      });
    });

    it('should leave out unset fields', () => {
      expect(K8ClientConfigMap.toObject({namespace: NamespaceName.of('storage'), name: 'empty'})).to.deep.equal({
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: {name: 'empty', namespace: 'storage'},
      });
    });
  });

  describe('fromObject', () => {
    it('should read back a wire document', () => {
      const read = K8ClientConfigMap.fromObject(JSON.parse(JSON.stringify(K8ClientConfigMap.toObject(configMap))));
      expect(read.name).to.equal('swift-rings');
      expect(read.namespace.name).to.equal('storage');
      expect(read.labels).to.deep.equal(configMap.labels);
      expect(read.data).to.deep.equal(configMap.data);
      expect(read.resourceVersion).to.equal('7');
      expect(read.ownerReferences).to.deep.equal(configMap.ownerReferences);
    });

    it('should keep annotations, binary data, immutability and finalizers', () => {
      const full: ConfigMap = {
        ...configMap,
        annotations: {'example.com/owner-team': 'storage'},
        binaryData: {blob: 'AAAA'},
        immutable: true,
        finalizers: ['example.com/keep'],
      };
      const document = K8ClientConfigMap.toObject(full);
      expect(document.metadata.annotations).to.deep.equal({'example.com/owner-team': 'storage'});
      expect(document.metadata.finalizers).to.deep.equal(['example.com/keep']);
      expect(document.binaryData).to.deep.equal({blob: 'AAAA'});
      expect(document.immutable).to.be.true;

      const read = K8ClientConfigMap.fromObject(JSON.parse(JSON.stringify(document)));
      expect(read.annotations).to.deep.equal(full.annotations);
      expect(read.binaryData).to.deep.equal(full.binaryData);
      expect(read.immutable).to.be.true;
      expect(read.finalizers).to.deep.equal(full.finalizers);
    });

    it('should reject finalizers that are not strings', () => {
      expect(() =>
        K8ClientConfigMap.fromObject({metadata: {name: 'a', namespace: 'b', finalizers: [1]}}),
      ).to.throw(DataValidationError, 'metadata.finalizers must hold strings');
    });

    it('should reject a document that is not an object', () => {
      expect(() => K8ClientConfigMap.fromObject([])).to.throw(DataValidationError, 'must be an object');
      expect(() => K8ClientConfigMap.fromObject('swift-rings')).to.throw(DataValidationError);
    });

    it('should reject another kind', () => {
      expect(() =>
        K8ClientConfigMap.fromObject({kind: 'Secret', metadata: {name: 'a', namespace: 'b'}}),
      ).to.throw(DataValidationError, 'unexpected kind');
    });

    it('should reject missing metadata', () => {
      expect(() => K8ClientConfigMap.fromObject({kind: 'ConfigMap'})).to.throw(DataValidationError, 'metadata');
      expect(() => K8ClientConfigMap.fromObject({metadata: {name: 'a'}})).to.throw(
        DataValidationError,
        'config map metadata must carry a name and a namespace',
      );
    });

    it('should reject data that is not a string map', () => {
      expect(() =>
        K8ClientConfigMap.fromObject({metadata: {name: 'a', namespace: 'b'}, data: {'rings.tar.gz': 1}}),
      ).to.throw(DataValidationError, 'data.rings.tar.gz must be a string');
    });

    it('should reject an invalid owner reference', () => {
      expect(() =>
        K8ClientConfigMap.fromObject({metadata: {name: 'a', namespace: 'b', ownerReferences: [{kind: 'Pod'}]}}),
      ).to.throw(DataValidationError, 'invalid owner reference');
    });
  });
});
