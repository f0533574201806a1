// SPDX-License-Identifier: Apache-2.0

import { describeKey } from './composite-key.js';
import { errorMessage, LedgerError, LedgerIOError } from './errors.js';
import type { EntityKind } from './types.js';

/**
 * World-state collaborator every operation runs against.
 * `get` resolves to undefined for a key that was never written; any rejection
 * from `get`, `put` or `scan` is treated as an I/O failure.
 */
export interface KeyValueLedger {
  get(key: string): Promise<Uint8Array | undefined>;
  put(key: string, value: Uint8Array): Promise<void>;
  createCompositeKey(category: string, attributes: readonly string[]): string;
  /** Entries whose key starts with `prefix`, in ascending key order. */
  scan(prefix: string): AsyncIterable<[string, Uint8Array]>;
}

function ioError(action: string, key: string, entity: EntityKind | undefined, err: unknown): LedgerError {
  if (err instanceof LedgerError) return err;
  return new LedgerIOError(
    `failed to ${action} world state at ${describeKey(key)}: ${errorMessage(err)}`,
    { entity, key, cause: err }
  );
}

/** Reads `key`; an empty value counts as absent. */
export async function readState(
  ledger: KeyValueLedger,
  key: string,
  entity?: EntityKind
): Promise<Uint8Array | undefined> {
  let value: Uint8Array | undefined;
  try {
    value = await ledger.get(key);
  } catch (err) {
    throw ioError('read from', key, entity, err);
  }
  return value !== undefined && value.length > 0 ? value : undefined;
}

export async function writeState(
  ledger: KeyValueLedger,
  key: string,
  value: Uint8Array,
  entity?: EntityKind
): Promise<void> {
  try {
    await ledger.put(key, value);
  } catch (err) {
    throw ioError('write to', key, entity, err);
  }
}

export async function* scanState(
  ledger: KeyValueLedger,
  prefix: string,
  entity?: EntityKind
): AsyncGenerator<[string, Uint8Array]> {
  const iterator = ledger.scan(prefix)[Symbol.asyncIterator]();
  for (;;) {
    let next: IteratorResult<[string, Uint8Array]>;
    try {
      next = await iterator.next();
    } catch (err) {
      throw ioError('scan', prefix, entity, err);
    }
    if (next.done) return;
    const [key, value] = next.value;
    if (value.length > 0) yield [key, value];
  }
}
