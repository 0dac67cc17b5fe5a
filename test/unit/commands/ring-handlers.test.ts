// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import fs from 'node:fs';
import {RingCommandHandlers} from '../../../src/commands/ring/handlers.js';
import {RingCommandTasks} from '../../../src/commands/ring/tasks.js';
import {RingCommandConfigs} from '../../../src/commands/ring/configs.js';
import {Flags as flags} from '../../../src/commands/flags.js';
import {ConfigManager} from '../../../src/core/config-manager.js';
import {RingManager} from '../../../src/core/ring-manager.js';
import {RingArchiveStore} from '../../../src/core/ring-archive-store.js';
import {Zippy} from '../../../src/core/zippy.js';
import {KeeperError} from '../../../src/core/errors/keeper-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';
import {Argv} from '../../helpers/argv-wrapper.js';
import {FakeRingBuilder, getTemporaryDirectory, getTestLogger} from '../../test-utility.js';
import {InMemoryConfigMaps, InMemoryK8Factory} from '../fixtures/in-memory-k8.fixture.js';

describe('RingCommandHandlers', () => {
  const logger = getTestLogger();

  let fake: FakeRingBuilder;
  let workDirectory: string;
  let ringDirectory: string;
  let devicesFile: string;
  let configMaps: InMemoryConfigMaps;
  let handlers: RingCommandHandlers;

  function argvFor(command: string): Argv {
    const argv = Argv.initializeEmpty();
    argv.setCommand(command);
    argv.setArg(flags.ringDirectory, ringDirectory);
    argv.setArg(flags.ringBuilder, fake.executable);
    argv.setArg(flags.devices, devicesFile);
    argv.setArg(flags.namespace, 'storage');
    return argv;
  }

  /** The builder file and subcommand of every ring-builder call */
  function subcommands(): string[] {
    return fake.calls().map(call => call.split(' ').slice(0, 2).join(' '));
  }

  beforeEach(() => {
    fake = new FakeRingBuilder();
    workDirectory = getTemporaryDirectory();
    ringDirectory = PathEx.join(workDirectory, 'rings');
    devicesFile = PathEx.join(workDirectory, 'devices');
    fs.writeFileSync(devicesFile, '# region zone host device weight\n1 1 10.0.0.1 sdb 100\n');

    configMaps = new InMemoryConfigMaps();
    const archiveStore = new RingArchiveStore(new InMemoryK8Factory(configMaps), new Zippy(logger), logger);
    const tasks = new RingCommandTasks(new RingManager(logger), archiveStore, logger);
    handlers = new RingCommandHandlers(tasks, new RingCommandConfigs(new ConfigManager(logger), logger), logger);
  });

  afterEach(() => {
    fake.remove();
    fs.rmSync(workDirectory, {recursive: true, force: true});
  });

  it('should build, rebalance and store new rings with all', async () => {
    await expect(handlers.all(argvFor('all').build())).to.eventually.be.true;

    expect(subcommands()).to.deep.equal([
      'account.builder create',
      'container.builder create',
      'object.builder create',
      'account.builder search',
      'account.builder add',
      'container.builder search',
      'container.builder add',
      'object.builder search',
      'object.builder add',
      'account.builder rebalance',
      'container.builder rebalance',
      'object.builder rebalance',
    ]);
    expect(configMaps.calls).to.deep.equal(['read storage/swift-rings', 'create storage/swift-rings']);
    expect(configMaps.get('storage', 'swift-rings')?.data).to.have.property('rings.tar.gz');
    expect(fs.existsSync(PathEx.join(ringDirectory, 'object.ring.gz'))).to.be.true;
  });

  it('should restore the rings with get and reweight known devices on the next run', async () => {
    await handlers.all(argvFor('all').build());
    fs.rmSync(ringDirectory, {recursive: true, force: true});
    fs.rmSync(PathEx.join(fake.directory, 'calls.log'));

    await expect(handlers.get(argvFor('get').build())).to.eventually.be.true;
    expect(fs.existsSync(PathEx.join(ringDirectory, 'account.builder'))).to.be.true;
    expect(fs.existsSync(PathEx.join(ringDirectory, '.configmap.json'))).to.be.true;

    await handlers.init(argvFor('init').build());
    await handlers.update(argvFor('update').build());
    expect(subcommands()).to.deep.equal([
      'account.builder search',
      'account.builder set_weight',
      'container.builder search',
      'container.builder set_weight',
      'object.builder search',
      'object.builder set_weight',
    ]);

    await handlers.push(argvFor('push').build());
    expect(configMaps.calls.at(-1)).to.equal('replace storage/swift-rings');
  });

  it('should run pretend_min_part_hours_passed before each rebalance with forced_rebalance', async () => {
    await handlers.init(argvFor('init').build());
    fs.rmSync(PathEx.join(fake.directory, 'calls.log'));

    await expect(handlers.forcedRebalance(argvFor('forced_rebalance').build())).to.eventually.be.true;

    expect(subcommands()).to.deep.equal([
      'account.builder pretend_min_part_hours_passed',
      'account.builder rebalance',
      'container.builder pretend_min_part_hours_passed',
      'container.builder rebalance',
      'object.builder pretend_min_part_hours_passed',
      'object.builder rebalance',
    ]);
  });

  it('should complete a rebalance whose rings report a warning', async () => {
    await handlers.init(argvFor('init').build());
    fake.rebalanceExitCode(1);

    await expect(handlers.rebalance(argvFor('rebalance').build())).to.eventually.be.true;
  });

  it('should wrap the failure of a task in a command error', async () => {
    try {
      await handlers.rebalance(argvFor('rebalance').build());
      expect.fail('expected rebalance to fail without builders');
    } catch (error) {
      expect(error).to.be.instanceOf(KeeperError);
      if (error instanceof KeeperError) {
        expect(error.message).to.match(/^Error rebalancing rings: missing ring builder /);
        expect(error.cause).to.be.instanceOf(IllegalArgumentError);
      }
    }
  });

  it('should fail on an invalid flag before running any task', async () => {
    const argv = argvFor('init');
    argv.setArg(flags.replicas, 0);

    await expect(handlers.init(argv.build())).to.be.rejectedWith(IllegalArgumentError, '--replicas must be at least 1');
    expect(fake.calls()).to.deep.equal([]);
  });
});
