// SPDX-License-Identifier: Apache-2.0

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { JournalEntry } from './types.js';
import { GENESIS_HASH, JOURNAL_FORMAT_VERSION } from './types.js';
import { SigningKey, hashPut, computeEntryHash, isoToNanos } from './crypto.js';
import { createCompositeKey } from './composite-key.js';
import { errorMessage, LedgerIOError } from './errors.js';
import type { KeyValueLedger } from './ledger.js';

export interface JournalConfig {
  dataDir: string;
  ledgerId?: string;
}

const JournalEntrySchema = z.object({
  format_version: z.literal(JOURNAL_FORMAT_VERSION),
  entry_id: z.string(),
  ledger_id: z.string(),
  seq: z.number().int().positive(),
  prev_hash: z.string(),
  ts: z.string().datetime(),
  key: z.string().min(1),
  value: z.string(),
  payload_hash: z.string(),
  hash_alg: z.string(),
  sig: z.string(),
  key_id: z.string(),
  public_key: z.string(),
});

function parseEntry(line: string, lineNumber: number): JournalEntry {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new LedgerIOError(`journal line ${lineNumber} is not JSON: ${errorMessage(err)}`, { cause: err });
  }
  const result = JournalEntrySchema.safeParse(parsed);
  if (!result.success) {
    throw new LedgerIOError(`journal line ${lineNumber} is not a valid entry`, { cause: result.error });
  }
  return result.data;
}

/**
 * File-backed world state. Every put is appended to `journal.jsonl` as a
 * signed entry chained to the previous one; the state map is rebuilt by
 * replaying the journal on first use.
 */
export class JournalLedger implements KeyValueLedger {
  private readonly config: JournalConfig;
  private readonly signingKey: SigningKey;
  private readonly state = new Map<string, Uint8Array>();
  private ledgerId: string;
  private seq = 0;
  private headHash = GENESIS_HASH;
  private initializing?: Promise<void>;
  private appendTail: Promise<unknown> = Promise.resolve();

  constructor(signingKey: SigningKey, config: JournalConfig) {
    this.signingKey = signingKey;
    this.config = config;
    this.ledgerId = config.ledgerId ?? `ledger_${signingKey.keyId}`;
  }

  get journalPath(): string {
    return path.join(this.config.dataDir, 'journal.jsonl');
  }

  initialize(): Promise<void> {
    this.initializing ??= this.replay();
    return this.initializing;
  }

  private async replay(): Promise<void> {
    fs.mkdirSync(this.config.dataDir, { recursive: true });

    let first = true;
    for await (const entry of this.readEntries()) {
      if (first) {
        this.ledgerId = entry.ledger_id;
        first = false;
      }
      this.state.set(entry.key, Uint8Array.from(Buffer.from(entry.value, 'base64')));
      this.seq = entry.seq;
      this.headHash = computeEntryHash(entry.seq, isoToNanos(entry.ts), entry.prev_hash, entry.payload_hash);
    }
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    await this.initialize();
    const value = this.state.get(key);
    return value === undefined ? undefined : Uint8Array.from(value);
  }

  put(key: string, value: Uint8Array): Promise<void> {
    const appended = this.appendTail.then(() => this.append(key, value));
    // A failed append rejects for its caller only; later appends still run.
    this.appendTail = appended.catch(() => undefined);
    return appended.then(() => undefined);
  }

  private async append(key: string, value: Uint8Array): Promise<JournalEntry> {
    await this.initialize();

    const seq = this.seq + 1;
    const ts = new Date().toISOString();
    const encoded = Buffer.from(value).toString('base64');
    const payloadHash = hashPut(key, encoded);
    const entryHash = computeEntryHash(seq, isoToNanos(ts), this.headHash, payloadHash);
    const signature = await this.signingKey.sign(Buffer.from(entryHash, 'utf-8'));

    const entry: JournalEntry = {
      format_version: JOURNAL_FORMAT_VERSION,
      entry_id: `ent_${randomUUID()}`,
      ledger_id: this.ledgerId,
      seq,
      prev_hash: this.headHash,
      ts,
      key,
      value: encoded,
      payload_hash: payloadHash,
      hash_alg: 'blake3',
      sig: signature,
      key_id: this.signingKey.keyId,
      public_key: this.signingKey.publicKeyBase64(),
    };

    // No await between this check and the append: another handle's write cannot land in between.
    this.assertHeadOnDisk();
    fs.appendFileSync(this.journalPath, JSON.stringify(entry) + '\n');

    this.seq = seq;
    this.headHash = entryHash;
    this.state.set(key, Uint8Array.from(value));
    return entry;
  }

  /** Refuses to append when another writer has extended the journal since this handle last read it. */
  private assertHeadOnDisk(): void {
    let seq = 0;
    let headHash = GENESIS_HASH;
    if (fs.existsSync(this.journalPath)) {
      const lines = fs.readFileSync(this.journalPath, 'utf-8').split('\n');
      let index = lines.length - 1;
      while (index >= 0 && !lines[index].trim()) index--;
      if (index >= 0) {
        const last = parseEntry(lines[index], index + 1);
        seq = last.seq;
        headHash = computeEntryHash(last.seq, isoToNanos(last.ts), last.prev_hash, last.payload_hash);
      }
    }
    if (seq !== this.seq || headHash !== this.headHash) {
      throw new LedgerIOError(
        `journal ${this.journalPath} was written by another handle (on disk at seq ${seq}, expected ${this.seq})`
      );
    }
  }

  createCompositeKey(category: string, attributes: readonly string[]): string {
    return createCompositeKey(category, attributes);
  }

  async *scan(prefix: string): AsyncGenerator<[string, Uint8Array]> {
    await this.initialize();
    const keys = [...this.state.keys()].filter(k => k.startsWith(prefix)).sort();
    for (const key of keys) {
      const value = this.state.get(key);
      if (value !== undefined) yield [key, Uint8Array.from(value)];
    }
  }

  /** Entries in file order. A line that is not a journal entry is a LedgerIOError. */
  async *readEntries(): AsyncGenerator<JournalEntry> {
    if (!fs.existsSync(this.journalPath)) return;

    const lines = fs.readFileSync(this.journalPath, 'utf-8').split('\n');
    for (const [index, line] of lines.entries()) {
      if (!line.trim()) continue;
      yield parseEntry(line, index + 1);
    }
  }

  getSeq(): number {
    return this.seq;
  }

  getHeadHash(): string {
    return this.headHash;
  }
}
