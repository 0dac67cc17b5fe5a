// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import {type Device} from '../integration/ring-builder/model/device.js';
import {DataValidationError} from './errors/data-validation-error.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';

const DEVICE_LINE_FORMAT = '<region> <zone> <host> <device> <weight>';
const INTEGER = /^\d+$/;
const DECIMAL = /^\d+(\.\d+)?$/;

/**
 * The devices file lists one device per line as `<region> <zone> <host> <device> <weight>`.
 * Blank lines and lines starting with `#` are skipped.
 */
export class DevicesFile {
  private constructor() {}

  /**
   * @throws IllegalArgumentError if the file does not exist
   * @throws DataValidationError if a line is not a device entry
   */
  public static read(filePath: string): Device[] {
    if (!fs.existsSync(filePath)) {
      throw new IllegalArgumentError(`devices file not found: ${filePath}`, filePath);
    }
    return DevicesFile.parse(fs.readFileSync(filePath, 'utf8'));
  }

  /**
   * @throws DataValidationError if a line is not a device entry, the message names the line number
   */
  public static parse(content: string): Device[] {
    const devices: Device[] = [];

    content.split(/\r?\n/).forEach((rawLine, index) => {
      const line: string = rawLine.trim();
      if (!line || line.startsWith('#')) {
        return;
      }

      const lineNumber: number = index + 1;
      const fields: string[] = line.split(/\s+/);
      if (fields.length !== 5) {
        throw new DataValidationError(
          `devices file line ${lineNumber}: expected 5 fields, found ${fields.length}`,
          DEVICE_LINE_FORMAT,
          line,
        );
      }

      const [region, zone, host, device, weight] = fields;
      if (!INTEGER.test(region)) {
        throw new DataValidationError(`devices file line ${lineNumber}: region must be an integer`, 'integer', region);
      }
      if (!INTEGER.test(zone)) {
        throw new DataValidationError(`devices file line ${lineNumber}: zone must be an integer`, 'integer', zone);
      }
      if (!DECIMAL.test(weight)) {
        throw new DataValidationError(`devices file line ${lineNumber}: weight must be a number`, 'number', weight);
      }

      devices.push({
        region: Number.parseInt(region, 10),
        zone: Number.parseInt(zone, 10),
        host,
        device,
        weight: Number.parseFloat(weight),
      });
    });

    return devices;
  }
}
