// SPDX-License-Identifier: Apache-2.0

import type { DataRecord } from './types.js';
import { DATA_RECORD_CATEGORY } from './types.js';
import type { KeyValueLedger } from './ledger.js';
import { readState, scanState, writeState } from './ledger.js';
import { decodeDataRecord, encodeDataRecord } from './codec.js';
import { deviceExists } from './devices.js';
import { DeviceNotRegisteredError, NotFoundError } from './errors.js';

export function dataRecordKey(ledger: KeyValueLedger, deviceID: string, timestamp: string): string {
  return ledger.createCompositeKey(DATA_RECORD_CATEGORY, [deviceID, timestamp]);
}

/**
 * Reads the record stored under `key`. Shared with the verification
 * workflow so both report absence the same way.
 */
export async function loadDataRecord(
  ledger: KeyValueLedger,
  key: string,
  deviceID: string,
  timestamp: string
): Promise<DataRecord> {
  const value = await readState(ledger, key, 'DataRecord');
  if (value === undefined) {
    throw new NotFoundError(`data record for device ${deviceID} at ${timestamp} does not exist`, {
      entity: 'DataRecord',
      key,
    });
  }
  return decodeDataRecord(key, value);
}

export async function submitData(
  ledger: KeyValueLedger,
  deviceID: string,
  timestamp: string,
  data: string
): Promise<DataRecord> {
  if (!(await deviceExists(ledger, deviceID))) {
    throw new DeviceNotRegisteredError(`device ${deviceID} not registered`, { entity: 'Device', key: deviceID });
  }

  const key = dataRecordKey(ledger, deviceID, timestamp);
  const record: DataRecord = {
    deviceID,
    timestamp,
    data,
    status: 'pending',
  };
  // Same (deviceID, timestamp) replaces the earlier record.
  await writeState(ledger, key, encodeDataRecord(record), 'DataRecord');
  return record;
}

export async function getDataRecord(
  ledger: KeyValueLedger,
  deviceID: string,
  timestamp: string
): Promise<DataRecord> {
  return loadDataRecord(ledger, dataRecordKey(ledger, deviceID, timestamp), deviceID, timestamp);
}

export async function listDataRecords(ledger: KeyValueLedger, deviceID: string): Promise<DataRecord[]> {
  const prefix = ledger.createCompositeKey(DATA_RECORD_CATEGORY, [deviceID]);
  const records: DataRecord[] = [];
  for await (const [key, value] of scanState(ledger, prefix, 'DataRecord')) {
    records.push(decodeDataRecord(key, value));
  }
  return records;
}
