// SPDX-License-Identifier: Apache-2.0

/**
 * A storage device as listed in the devices file.
 */
export interface Device {
  readonly region: number;
  readonly zone: number;
  readonly host: string;
  readonly device: string;
  readonly weight: number;
}

/**
 * A device placed in a ring, the port is the one the ring's storage server listens on.
 * Within a ring a device is identified by region, zone, host, port and device name.
 */
export interface RingDevice extends Device {
  readonly port: number;
}
