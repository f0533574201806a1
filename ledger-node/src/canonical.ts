// SPDX-License-Identifier: Apache-2.0

/**
 * Canonical JSON used for every payload written to world state.
 * - Keys sorted lexicographically
 * - No whitespace
 * - Strings kept verbatim so decoding returns exactly what was encoded
 * - Properties whose value is undefined are omitted
 * - Non-integer numbers rejected
 */

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new TypeError(`Only safe integers are allowed in canonical JSON: ${value}`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      if (v !== undefined) result[k] = toJsonValue(v);
    }
    return result;
  }
  throw new TypeError(`Unsupported type in canonical JSON: ${typeof value}`);
}

function stringify(value: JsonValue): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return '[' + value.map(stringify).join(',') + ']';
  }
  const keys = Object.keys(value).sort();
  return '{' + keys.map(k => JSON.stringify(k) + ':' + stringify(value[k])).join(',') + '}';
}

export function canonicalJson(value: unknown): Buffer {
  return Buffer.from(stringify(toJsonValue(value)), 'utf-8');
}
