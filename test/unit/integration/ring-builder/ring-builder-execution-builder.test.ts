// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {RingBuilderExecutionBuilder} from '../../../../src/integration/ring-builder/execution/ring-builder-execution-builder.js';
import {MissingArgumentError} from '../../../../src/core/errors/missing-argument-error.js';
import {getTestLogger} from '../../../test-utility.js';

describe('RingBuilderExecutionBuilder', () => {
  const logger = getTestLogger();

  it('should place the builder file and subcommand before arguments and positionals', () => {
    const command = new RingBuilderExecutionBuilder('swift-ring-builder', logger)
      .builderFile('object.builder')
      .subcommand('set_weight')
      .argument('region', '1')
      .argument('zone', '2')
      .positional('100')
      .buildCommand();

    expect(command.join(' ')).to.equal('swift-ring-builder object.builder set_weight --region 1 --zone 2 100');
  });

  it('should keep the last value of a repeated argument in its first position', () => {
    const command = new RingBuilderExecutionBuilder('swift-ring-builder', logger)
      .builderFile('object.builder')
      .subcommand('search')
      .argument('region', '1')
      .argument('zone', '2')
      .argument('region', '3')
      .buildCommand();

    expect(command).to.deep.equal(['swift-ring-builder', 'object.builder', 'search', '--region', '3', '--zone', '2']);
  });

  it('should require an executable', () => {
    expect(() => new RingBuilderExecutionBuilder('', logger)).to.throw(MissingArgumentError);
  });

  it('should require a builder file and a subcommand', () => {
    expect(() => new RingBuilderExecutionBuilder('swift-ring-builder', logger).subcommand('rebalance').buildCommand()).to.throw(
      MissingArgumentError,
      'builder file is required',
    );
    expect(() =>
      new RingBuilderExecutionBuilder('swift-ring-builder', logger).builderFile('object.builder').buildCommand(),
    ).to.throw(MissingArgumentError, 'subcommand is required');
  });

  it('should reject empty names and values', () => {
    const builder = new RingBuilderExecutionBuilder('swift-ring-builder', logger);
    expect(() => builder.argument('', '1')).to.throw(MissingArgumentError);
    expect(() => builder.argument('region', '')).to.throw(MissingArgumentError);
    expect(() => builder.positional('')).to.throw(MissingArgumentError);
    expect(() => builder.environmentVariable('', 'x')).to.throw(MissingArgumentError);
    expect(() => builder.workingDirectory('')).to.throw(MissingArgumentError);
  });
});
