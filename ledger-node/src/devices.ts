// SPDX-License-Identifier: Apache-2.0

import type { Device } from './types.js';
import type { KeyValueLedger } from './ledger.js';
import { readState, writeState } from './ledger.js';
import { COMPOSITE_KEY_NAMESPACE } from './composite-key.js';
import { decodeDevice, encodeDevice } from './codec.js';
import { AlreadyExistsError, InvalidArgumentError, NotFoundError } from './errors.js';

/**
 * Devices are stored under their id as a plain key. An id that starts with
 * the composite-key namespace could shadow a data record, so it is refused.
 */
function validateDeviceId(deviceID: string): void {
  if (deviceID.length === 0) {
    throw new InvalidArgumentError('device id must not be empty', { entity: 'Device' });
  }
  if (deviceID.startsWith(COMPOSITE_KEY_NAMESPACE)) {
    throw new InvalidArgumentError(`device id must not start with U+0000: ${JSON.stringify(deviceID)}`, {
      entity: 'Device',
      key: deviceID,
    });
  }
}

export async function deviceExists(ledger: KeyValueLedger, deviceID: string): Promise<boolean> {
  validateDeviceId(deviceID);
  const value = await readState(ledger, deviceID, 'Device');
  return value !== undefined;
}

export async function registerDevice(
  ledger: KeyValueLedger,
  deviceID: string,
  owner: string,
  location: string
): Promise<Device> {
  if (await deviceExists(ledger, deviceID)) {
    throw new AlreadyExistsError(`device ${deviceID} already registered`, { entity: 'Device', key: deviceID });
  }

  const device: Device = {
    id: deviceID,
    owner,
    location,
    status: 'active',
  };
  await writeState(ledger, deviceID, encodeDevice(device), 'Device');
  return device;
}

export async function getDevice(ledger: KeyValueLedger, deviceID: string): Promise<Device> {
  validateDeviceId(deviceID);
  const value = await readState(ledger, deviceID, 'Device');
  if (value === undefined) {
    throw new NotFoundError(`device ${deviceID} does not exist`, { entity: 'Device', key: deviceID });
  }
  return decodeDevice(deviceID, value);
}
