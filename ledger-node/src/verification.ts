// SPDX-License-Identifier: Apache-2.0

import type { DataRecord, DataRecordStatus } from './types.js';
import type { KeyValueLedger } from './ledger.js';
import { writeState } from './ledger.js';
import { encodeDataRecord } from './codec.js';
import { dataRecordKey, loadDataRecord } from './records.js';

export function verdictStatus(isValid: boolean): Exclude<DataRecordStatus, 'pending'> {
  return isValid ? 'verified' : 'rejected';
}

/**
 * Records a verifier's verdict on a submitted data record.
 * The transition does not look at the current status: a record that was
 * already verified or rejected takes the new verdict and verifier.
 */
export async function verifyData(
  ledger: KeyValueLedger,
  deviceID: string,
  timestamp: string,
  verifierID: string,
  isValid: boolean
): Promise<DataRecord> {
  const key = dataRecordKey(ledger, deviceID, timestamp);
  const record = await loadDataRecord(ledger, key, deviceID, timestamp);

  const updated: DataRecord = {
    ...record,
    status: verdictStatus(isValid),
    verifierID,
  };
  await writeState(ledger, key, encodeDataRecord(updated), 'DataRecord');
  return updated;
}
