// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {RingCommandConfigs, type RingCommandConfig} from '../../../src/commands/ring/configs.js';
import {Flags as flags} from '../../../src/commands/flags.js';
import {ConfigManager} from '../../../src/core/config-manager.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {NamespaceName} from '../../../src/integration/kube/resources/namespace/namespace-name.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';
import {Argv} from '../../helpers/argv-wrapper.js';
import {getTestLogger} from '../../test-utility.js';

describe('RingCommandConfigs', () => {
  const logger = getTestLogger();
  const configs = new RingCommandConfigs(new ConfigManager(logger), logger);

  let argv: Argv;

  beforeEach(() => {
    argv = Argv.initializeEmpty();
    argv.setCommand('all');
  });

  it('should fall back to the defaults', () => {
    const config: RingCommandConfig = configs.configBuilder(argv.build());

    expect(config.ring).to.deep.equal({
      ringDirectory: PathEx.resolve('rings'),
      ringBuilder: 'swift-ring-builder',
      partPower: 10,
      replicas: 3,
      minPartHours: 1,
      ports: {account: 6202, container: 6201, object: 6200},
    });
    expect(config.archive).to.deep.equal({
      ringDirectory: PathEx.resolve('rings'),
      configMapName: 'swift-rings',
      dataKey: 'rings.tar.gz',
      namespace: undefined,
      context: undefined,
      owner: undefined,
    });
    expect(config.devicesFile).to.equal(PathEx.resolve('devices'));
  });

  it('should take the flag values', () => {
    argv.setArg(flags.ringDirectory, '/var/lib/rings');
    argv.setArg(flags.devices, '/etc/swift/devices');
    argv.setArg(flags.partPower, 14);
    argv.setArg(flags.objectPort, '7000');
    argv.setArg(flags.namespace, 'storage');
    argv.setArg(flags.context, 'kind-storage');
    argv.setArg(flags.configMap, 'object-rings');
    argv.setArg(flags.dataKey, 'rings.tgz');

    const config: RingCommandConfig = configs.configBuilder(argv.build());

    expect(config.ring.ringDirectory).to.equal('/var/lib/rings');
    expect(config.archive.ringDirectory).to.equal('/var/lib/rings');
    expect(config.devicesFile).to.equal('/etc/swift/devices');
    expect(config.ring.partPower).to.equal(14);
    expect(config.ring.ports.object).to.equal(7000);
    expect(config.archive.namespace).to.deep.equal(NamespaceName.of('storage'));
    expect(config.archive.context).to.equal('kind-storage');
    expect(config.archive.configMapName).to.equal('object-rings');
    expect(config.archive.dataKey).to.equal('rings.tgz');
  });

  it('should not carry values over from a previous command', () => {
    argv.setArg(flags.replicas, 2);
    expect(configs.configBuilder(argv.build()).ring.replicas).to.equal(2);

    expect(configs.configBuilder(Argv.initializeEmpty().build()).ring.replicas).to.equal(3);
  });

  it('should resolve a ring-builder given as a path and keep a bare name', () => {
    argv.setArg(flags.ringBuilder, PathEx.join('bin', 'swift-ring-builder'));
    expect(configs.configBuilder(argv.build()).ring.ringBuilder).to.equal(PathEx.resolve('bin', 'swift-ring-builder'));

    argv.setArg(flags.ringBuilder, 'my-ring-builder');
    expect(configs.configBuilder(argv.build()).ring.ringBuilder).to.equal('my-ring-builder');
  });

  it('should build the owner reference from the owner flags', () => {
    argv.setArg(flags.ownerName, 'swift-proxy-0');
    argv.setArg(flags.ownerUid, 'test-uid');

    expect(configs.configBuilder(argv.build()).archive.owner).to.deep.equal({
      apiVersion: 'v1',
      kind: 'Pod',
      name: 'swift-proxy-0',
      uid: 'test-uid',
    });

    argv.setArg(flags.ownerApiVersion, 'apps/v1');
    argv.setArg(flags.ownerKind, 'StatefulSet');
    expect(configs.configBuilder(argv.build()).archive.owner).to.deep.equal({
      apiVersion: 'apps/v1',
      kind: 'StatefulSet',
      name: 'swift-proxy-0',
      uid: 'test-uid',
    });
  });

  it('should require the owner name and uid together', () => {
    argv.setArg(flags.ownerName, 'swift-proxy-0');

    expect(() => configs.configBuilder(argv.build())).to.throw(
      IllegalArgumentError,
      '--owner-name and --owner-uid must be given together',
    );
  });

  it('should reject values out of range', () => {
    argv.setArg(flags.accountPort, 70_000);
    expect(() => configs.configBuilder(argv.build())).to.throw(IllegalArgumentError, '--account-port must be a valid port');

    argv = Argv.initializeEmpty();
    argv.setArg(flags.partPower, 0);
    expect(() => configs.configBuilder(argv.build())).to.throw(IllegalArgumentError, '--part-power must be at least 1');

    argv = Argv.initializeEmpty();
    argv.setArg(flags.minPartHours, -1);
    expect(() => configs.configBuilder(argv.build())).to.throw(
      IllegalArgumentError,
      '--min-part-hours must be at least 0',
    );
  });

  it('should reject an invalid ConfigMap name or data key', () => {
    argv.setArg(flags.configMap, 'Swift_Rings');
    expect(() => configs.configBuilder(argv.build())).to.throw(
      IllegalArgumentError,
      '--config-map must be a valid DNS-1123 subdomain',
    );

    argv = Argv.initializeEmpty();
    argv.setArg(flags.dataKey, 'rings/tar');
    expect(() => configs.configBuilder(argv.build())).to.throw(IllegalArgumentError, '--data-key must consist of');
  });
});
