// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {KeeperError} from '../../../src/core/errors/keeper-error.js';
import {MissingArgumentError} from '../../../src/core/errors/missing-argument-error.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {Zippy} from '../../../src/core/zippy.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';
import {getTemporaryDirectory, getTestLogger} from '../../test-utility.js';

describe('Zippy', () => {
  const zippy = new Zippy(getTestLogger());
  let temporaryDirectory: string;

  beforeEach(() => {
    temporaryDirectory = getTemporaryDirectory();
  });

  afterEach(() => fs.rmSync(temporaryDirectory, {recursive: true, force: true}));

  describe('tar', () => {
    it('should fail if source path is missing', () => {
      expect(() => zippy.tar('', 'rings.tar.gz')).to.throw(MissingArgumentError);
    });

    it('should fail if destination path is missing', () => {
      expect(() => zippy.tar(temporaryDirectory, '')).to.throw(MissingArgumentError);
    });

    it('should fail if destination is not a tar.gz file', () => {
      expect(() => zippy.tar(temporaryDirectory, PathEx.join(temporaryDirectory, 'rings.zip'))).to.throw(
        MissingArgumentError,
      );
    });

    it('should fail if source path is invalid', () => {
      expect(() => zippy.tar('/INVALID', PathEx.join(os.tmpdir(), 'invalid.tar.gz'))).to.throw(IllegalArgumentError);
    });
  });

  describe('untar', () => {
    it('should fail if source file is missing', () => {
      expect(() => zippy.untar('', '')).to.throw(MissingArgumentError);
    });

    it('should fail if source file is invalid', () => {
      expect(() => zippy.untar('/INVALID', temporaryDirectory)).to.throw(IllegalArgumentError);
    });

    it('should fail for a non-tar file', () => {
      const textFile = PathEx.join(temporaryDirectory, 'test.txt');
      fs.writeFileSync(textFile, 'not an archive');
      expect(() => zippy.untar(textFile, PathEx.join(temporaryDirectory, 'out'))).to.throw(KeeperError);
    });
  });

  it('should archive a directory and extract it elsewhere', () => {
    const source = PathEx.join(temporaryDirectory, 'rings');
    fs.mkdirSync(PathEx.join(source, 'backups'), {recursive: true});
    fs.writeFileSync(PathEx.join(source, 'object.builder'), 'object');
    fs.writeFileSync(PathEx.join(source, 'backups', 'old.builder'), 'old');
    fs.writeFileSync(PathEx.join(source, 'skip.me'), 'skipped');

    const tarFile = PathEx.join(temporaryDirectory, 'rings.tar.gz');
    expect(zippy.tar(source, tarFile, entryPath => path.basename(entryPath) !== 'skip.me')).to.equal(tarFile);

    const destination = PathEx.join(temporaryDirectory, 'extracted');
    expect(zippy.untar(tarFile, destination)).to.equal(destination);
    expect(fs.readFileSync(PathEx.join(destination, 'object.builder'), 'utf8')).to.equal('object');
    expect(fs.readFileSync(PathEx.join(destination, 'backups', 'old.builder'), 'utf8')).to.equal('old');
    expect(fs.existsSync(PathEx.join(destination, 'skip.me'))).to.be.false;
  });
});
