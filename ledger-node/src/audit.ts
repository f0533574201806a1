// SPDX-License-Identifier: Apache-2.0

import type { AuditResult, JournalEntry, MissingRange } from './types.js';
import { GENESIS_HASH } from './types.js';
import { hashPut, computeEntryHash, isoToNanos, VerifyingKey } from './crypto.js';
import type { JournalLedger } from './journal.js';

export interface AuditOptions {
  /** Require every entry to be signed by this key. */
  trustedKey?: VerifyingKey;
}

async function entryIsAuthentic(
  entry: JournalEntry,
  entryHash: string,
  options: AuditOptions | undefined
): Promise<boolean> {
  if (options?.trustedKey && entry.public_key !== options.trustedKey.publicKeyBase64()) {
    return false;
  }
  let signer: VerifyingKey;
  try {
    signer = VerifyingKey.fromBase64(entry.public_key, entry.key_id);
  } catch {
    return false;
  }
  return signer.verify(entry.sig, Buffer.from(entryHash, 'utf-8'));
}

export async function auditJournal(journal: JournalLedger, options?: AuditOptions): Promise<AuditResult> {
  const missingRanges: MissingRange[] = [];
  let headHash = GENESIS_HASH;
  let expectedSeq = 1;
  let count = 0;
  let firstSeq: number | undefined;
  let lastSeq: number | undefined;

  for await (const entry of journal.readEntries()) {
    count += 1;
    firstSeq ??= entry.seq;

    const tampered = (): AuditResult => ({
      status: 'TAMPERED',
      count,
      first_seq: firstSeq,
      last_seq: entry.seq,
    });

    if (entry.seq < expectedSeq) return tampered();
    const contiguous = entry.seq === expectedSeq;
    if (!contiguous) {
      missingRanges.push({ from: expectedSeq, to: entry.seq - 1 });
    }

    // Across a gap the predecessor is unknown, so only contiguous links are checked.
    if (contiguous && entry.prev_hash !== headHash) return tampered();
    if (hashPut(entry.key, entry.value) !== entry.payload_hash) return tampered();

    const entryHash = computeEntryHash(entry.seq, isoToNanos(entry.ts), entry.prev_hash, entry.payload_hash);
    if (!(await entryIsAuthentic(entry, entryHash, options))) return tampered();

    headHash = entryHash;
    expectedSeq = entry.seq + 1;
    lastSeq = entry.seq;
  }

  if (count === 0) {
    return { status: 'EMPTY', count: 0 };
  }

  const result: AuditResult = {
    status: missingRanges.length > 0 ? 'INCOMPLETE' : 'VERIFIED',
    count,
    first_seq: firstSeq,
    last_seq: lastSeq,
    head_hash: headHash,
  };
  if (missingRanges.length > 0) {
    result.missing_ranges = missingRanges;
  }
  return result;
}
