// SPDX-License-Identifier: Apache-2.0

import { createCompositeKey } from './composite-key.js';
import type { KeyValueLedger } from './ledger.js';

export class MemoryLedger implements KeyValueLedger {
  private readonly state = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | undefined> {
    const value = this.state.get(key);
    return value === undefined ? undefined : Uint8Array.from(value);
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    this.state.set(key, Uint8Array.from(value));
  }

  createCompositeKey(category: string, attributes: readonly string[]): string {
    return createCompositeKey(category, attributes);
  }

  async *scan(prefix: string): AsyncGenerator<[string, Uint8Array]> {
    const keys = [...this.state.keys()].filter(k => k.startsWith(prefix)).sort();
    for (const key of keys) {
      const value = this.state.get(key);
      if (value !== undefined) yield [key, Uint8Array.from(value)];
    }
  }

  get size(): number {
    return this.state.size;
  }
}
