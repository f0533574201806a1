// SPDX-License-Identifier: Apache-2.0

import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';
import * as ed from '@noble/ed25519';
import { canonicalJson } from './canonical.js';

export function blake3Hash(data: Uint8Array): string {
  return bytesToHex(blake3(data));
}

/** Hash of one world-state write: BLAKE3 over canonical JSON of {key, value}. */
export function hashPut(key: string, valueBase64: string): string {
  return blake3Hash(canonicalJson({ key, value: valueBase64 }));
}

/**
 * Compute the hash that links a journal entry to its successor.
 * Format: BLAKE3(seq_le_u64 || ts_ns_le_i64 || prev_hash_utf8 || payload_hash_utf8)
 */
export function computeEntryHash(
  seq: number,
  timestampNs: bigint,
  prevHash: string,
  payloadHash: string
): string {
  const seqBuf = Buffer.alloc(8);
  seqBuf.writeBigUInt64LE(BigInt(seq));

  const tsBuf = Buffer.alloc(8);
  tsBuf.writeBigInt64LE(timestampNs);

  return blake3Hash(Buffer.concat([
    seqBuf,
    tsBuf,
    Buffer.from(prevHash, 'utf-8'),
    Buffer.from(payloadHash, 'utf-8'),
  ]));
}

export function isoToNanos(isoTimestamp: string): bigint {
  return BigInt(new Date(isoTimestamp).getTime()) * 1_000_000n;
}

export class SigningKey {
  readonly keyId: string;
  private readonly seed: Uint8Array;
  readonly publicKey: Uint8Array;

  private constructor(keyId: string, seed: Uint8Array, publicKey: Uint8Array) {
    this.keyId = keyId;
    this.seed = seed;
    this.publicKey = publicKey;
  }

  static async generate(keyId?: string): Promise<SigningKey> {
    const seed = ed.utils.randomPrivateKey();
    const publicKey = await ed.getPublicKeyAsync(seed);
    const id = keyId ?? `kid_${bytesToHex(publicKey.slice(0, 8))}`;
    return new SigningKey(id, seed, publicKey);
  }

  static async fromSeedHex(seedHex: string, keyId: string): Promise<SigningKey> {
    const seed = Uint8Array.from(Buffer.from(seedHex, 'hex'));
    if (seed.length !== 32) {
      throw new Error(`Ed25519 seed must be 32 bytes, got ${seed.length}`);
    }
    const publicKey = await ed.getPublicKeyAsync(seed);
    return new SigningKey(keyId, seed, publicKey);
  }

  async sign(data: Uint8Array): Promise<string> {
    return bytesToHex(await ed.signAsync(data, this.seed));
  }

  seedHex(): string {
    return bytesToHex(this.seed);
  }

  publicKeyHex(): string {
    return bytesToHex(this.publicKey);
  }

  publicKeyBase64(): string {
    return Buffer.from(this.publicKey).toString('base64');
  }

  verifyingKey(): VerifyingKey {
    return new VerifyingKey(this.keyId, this.publicKey);
  }
}

export class VerifyingKey {
  readonly keyId: string;
  readonly publicKey: Uint8Array;

  constructor(keyId: string, publicKey: Uint8Array) {
    this.keyId = keyId;
    this.publicKey = publicKey;
  }

  static fromBase64(base64: string, keyId: string): VerifyingKey {
    const publicKey = Uint8Array.from(Buffer.from(base64, 'base64'));
    if (publicKey.length !== 32) {
      throw new Error(`Ed25519 public key must be 32 bytes, got ${publicKey.length}`);
    }
    return new VerifyingKey(keyId, publicKey);
  }

  publicKeyBase64(): string {
    return Buffer.from(this.publicKey).toString('base64');
  }

  /** False for a malformed signature as well as a wrong one. */
  async verify(signatureHex: string, data: Uint8Array): Promise<boolean> {
    if (!/^[0-9a-f]{128}$/i.test(signatureHex)) return false;
    return ed.verifyAsync(Buffer.from(signatureHex, 'hex'), data, this.publicKey);
  }
}
