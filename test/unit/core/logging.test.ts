// SPDX-License-Identifier: Apache-2.0

import {type SinonSpy} from 'sinon';
import sinon from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';
import winston from 'winston';

import {type KeeperLogger} from '../../../src/core/logging/keeper-logger.js';
import {KeeperWinstonLogger} from '../../../src/core/logging/keeper-winston-logger.js';
import {KeeperError} from '../../../src/core/errors/keeper-error.js';

describe('Logging', () => {
  let logger: KeeperLogger;
  let loggerSpy: SinonSpy;

  beforeEach(() => {
    logger = new KeeperWinstonLogger('debug', false);
    loggerSpy = sinon.spy(winston.Logger.prototype, 'log');
  });

  // Cleanup after each test
  afterEach(() => sinon.restore());

  it('should log at correct severity', () => {
    const meta = logger.prepMeta();

    logger.error('Error log');
    expect(loggerSpy).to.have.been.calledWith('error', 'Error log', meta);

    logger.warn('Warn log');
    expect(loggerSpy).to.have.been.calledWith('warn', 'Warn log', meta);

    logger.info('Info log');
    expect(loggerSpy).to.have.been.calledWith('info', 'Info log', meta);

    logger.debug('Debug log');
    expect(loggerSpy).to.have.been.calledWith('debug', 'Debug log', meta);
  });

  it('should start a new trace id on request', () => {
    const first = logger.prepMeta().traceId;
    logger.nextTraceId();
    const second = logger.prepMeta().traceId;

    expect(first).to.be.a('string');
    expect(second).to.be.a('string');
    expect(second).not.to.equal(first);
  });

  it('should print the first message of an error outside dev mode', () => {
    const consoleStub = sinon.stub(console, 'log');

    logger.showUserError(new KeeperError('outer failure', new Error('inner failure')));

    const printed: string[] = consoleStub.getCalls().map(call => String(call.args[0]));
    consoleStub.restore();
    expect(printed.some(line => line.includes('outer failure'))).to.be.true;
    expect(printed.some(line => line.includes('inner failure'))).to.be.false;
    expect(loggerSpy).to.have.been.calledWith('error', 'outer failure');
  });

  it('should print the cause chain in dev mode', () => {
    logger.setDevMode(true);
    const consoleStub = sinon.stub(console, 'log');

    logger.showUserError(new KeeperError('outer failure', new Error('inner failure')));

    const printed: string[] = consoleStub.getCalls().map(call => String(call.args[0]));
    consoleStub.restore();
    expect(printed.some(line => line.includes('outer failure'))).to.be.true;
    expect(printed.some(line => line.includes('Caused by: ') && line.includes('inner failure'))).to.be.true;
  });
});
