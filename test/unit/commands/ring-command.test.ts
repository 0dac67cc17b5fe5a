// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import sinon from 'sinon';
import {RingCommand} from '../../../src/commands/ring/index.js';
import {RingCommandHandlers} from '../../../src/commands/ring/handlers.js';
import * as commands from '../../../src/commands/index.js';
import {Argv} from '../../helpers/argv-wrapper.js';

describe('RingCommand', () => {
  it('should define every ring command', () => {
    const names: string[] = commands.Initialize().map(definition => `${definition.command}`);

    expect(names).to.deep.equal(['get', 'init', 'update', 'rebalance', 'forced_rebalance', 'push', 'all']);
  });

  it('should route each command to its handler', async () => {
    const handlers = sinon.createStubInstance(RingCommandHandlers);
    handlers.forcedRebalance.resolves(true);
    const definition = new RingCommand(handlers)
      .getCommandDefinitions()
      .find(command => command.command === 'forced_rebalance');

    const argv = Argv.initializeEmpty();
    argv.setCommand('forced_rebalance');
    await definition?.handler(argv.build());

    expect(handlers.forcedRebalance).to.have.been.calledOnce;
    expect(handlers.rebalance).to.not.have.been.called;
  });
});
