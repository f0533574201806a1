// SPDX-License-Identifier: Apache-2.0

export const DEVICE_STATUSES = ['active', 'inactive'] as const;
export type DeviceStatus = (typeof DEVICE_STATUSES)[number];

export const DATA_RECORD_STATUSES = ['pending', 'verified', 'rejected'] as const;
export type DataRecordStatus = (typeof DATA_RECORD_STATUSES)[number];

export interface Device {
  id: string;
  owner: string;
  location: string;
  status: DeviceStatus;
}

export interface DataRecord {
  deviceID: string;
  timestamp: string;
  data: string;
  status: DataRecordStatus;
  verifierID?: string;
}

export type EntityKind = 'Device' | 'DataRecord';

export const DATA_RECORD_CATEGORY = 'DataRecord';

export interface JournalEntry {
  format_version: number;
  entry_id: string;
  ledger_id: string;
  seq: number;
  prev_hash: string;
  ts: string;
  key: string;
  value: string;
  payload_hash: string;
  hash_alg: string;
  sig: string;
  key_id: string;
  public_key: string;
}

export type AuditStatus = 'VERIFIED' | 'TAMPERED' | 'INCOMPLETE' | 'EMPTY';

export interface MissingRange {
  from: number;
  to: number;
}

export interface AuditResult {
  status: AuditStatus;
  count: number;
  first_seq?: number;
  last_seq?: number;
  head_hash?: string;
  missing_ranges?: MissingRange[];
}

export const GENESIS_HASH = '0'.repeat(64);
export const JOURNAL_FORMAT_VERSION = 1;
