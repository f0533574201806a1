// SPDX-License-Identifier: Apache-2.0

import type { EntityKind } from './types.js';

export type LedgerErrorCode =
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'DEVICE_NOT_REGISTERED'
  | 'DESERIALIZATION_ERROR'
  | 'LEDGER_IO_ERROR'
  | 'INVALID_ARGUMENT';

export interface LedgerErrorContext {
  entity?: EntityKind;
  key?: string;
  cause?: unknown;
}

/**
 * Base class for every failure surfaced by the ledger operations.
 * `key` is the raw world-state key, which for data records is a composite key.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly entity?: EntityKind;
  readonly key?: string;

  constructor(code: LedgerErrorCode, message: string, context: LedgerErrorContext = {}) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.entity = context.entity;
    this.key = context.key;
  }
}

export class AlreadyExistsError extends LedgerError {
  constructor(message: string, context?: LedgerErrorContext) {
    super('ALREADY_EXISTS', message, context);
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string, context?: LedgerErrorContext) {
    super('NOT_FOUND', message, context);
  }
}

export class DeviceNotRegisteredError extends LedgerError {
  constructor(message: string, context?: LedgerErrorContext) {
    super('DEVICE_NOT_REGISTERED', message, context);
  }
}

export class DeserializationError extends LedgerError {
  constructor(message: string, context?: LedgerErrorContext) {
    super('DESERIALIZATION_ERROR', message, context);
  }
}

export class LedgerIOError extends LedgerError {
  constructor(message: string, context?: LedgerErrorContext) {
    super('LEDGER_IO_ERROR', message, context);
  }
}

export class InvalidArgumentError extends LedgerError {
  constructor(message: string, context?: LedgerErrorContext) {
    super('INVALID_ARGUMENT', message, context);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
