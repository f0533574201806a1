// SPDX-License-Identifier: Apache-2.0

// Types
export type {
  Device,
  DeviceStatus,
  DataRecord,
  DataRecordStatus,
  EntityKind,
  JournalEntry,
  AuditResult,
  AuditStatus,
  MissingRange,
} from './types.js';
export {
  DEVICE_STATUSES,
  DATA_RECORD_STATUSES,
  DATA_RECORD_CATEGORY,
  GENESIS_HASH,
  JOURNAL_FORMAT_VERSION,
} from './types.js';

// Errors
export type { LedgerErrorCode, LedgerErrorContext } from './errors.js';
export {
  LedgerError,
  AlreadyExistsError,
  NotFoundError,
  DeviceNotRegisteredError,
  DeserializationError,
  LedgerIOError,
  InvalidArgumentError,
} from './errors.js';

// World state
export type { KeyValueLedger } from './ledger.js';
export { readState, writeState, scanState } from './ledger.js';
export type { CompositeKeyParts } from './composite-key.js';
export {
  createCompositeKey,
  splitCompositeKey,
  isCompositeKey,
  COMPOSITE_KEY_NAMESPACE,
} from './composite-key.js';
export { MemoryLedger } from './memory.js';
export type { JournalConfig } from './journal.js';
export { JournalLedger } from './journal.js';

// Serialization
export { canonicalJson } from './canonical.js';
export {
  DeviceSchema,
  DataRecordSchema,
  encodeDevice,
  decodeDevice,
  encodeDataRecord,
  decodeDataRecord,
} from './codec.js';

// Crypto
export { SigningKey, VerifyingKey, blake3Hash } from './crypto.js';

// Operations
export { registerDevice, deviceExists, getDevice } from './devices.js';
export { submitData, getDataRecord, listDataRecords, dataRecordKey } from './records.js';
export { verifyData, verdictStatus } from './verification.js';

// Audit
export type { AuditOptions } from './audit.js';
export { auditJournal } from './audit.js';
