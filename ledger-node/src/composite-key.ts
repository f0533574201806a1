// SPDX-License-Identifier: Apache-2.0

import { InvalidArgumentError } from './errors.js';

/**
 * Composite key encoding.
 * Format: U+0000 || category || U+0000 || (attribute || U+0000)*
 *
 * Components may not contain U+0000, so every component ends at the first
 * delimiter after it and two distinct (category, attributes) tuples never
 * encode to the same key.
 */
export const COMPOSITE_KEY_NAMESPACE = '\u0000';
const DELIMITER = '\u0000';
const MAX_UNICODE_RUNE = '\u{10FFFF}';

export interface CompositeKeyParts {
  category: string;
  attributes: string[];
}

function validateComponent(value: string, label: string): void {
  if (value.includes(DELIMITER)) {
    throw new InvalidArgumentError(`${label} must not contain U+0000: ${JSON.stringify(value)}`);
  }
  if (value.includes(MAX_UNICODE_RUNE)) {
    throw new InvalidArgumentError(`${label} must not contain U+10FFFF: ${JSON.stringify(value)}`);
  }
}

export function createCompositeKey(category: string, attributes: readonly string[]): string {
  if (category.length === 0) {
    throw new InvalidArgumentError('composite key category must not be empty');
  }
  validateComponent(category, 'composite key category');

  let key = COMPOSITE_KEY_NAMESPACE + category + DELIMITER;
  for (const attribute of attributes) {
    validateComponent(attribute, 'composite key attribute');
    key += attribute + DELIMITER;
  }
  return key;
}

export function splitCompositeKey(key: string): CompositeKeyParts {
  if (!isCompositeKey(key) || !key.endsWith(DELIMITER)) {
    throw new InvalidArgumentError(`not a composite key: ${JSON.stringify(key)}`);
  }
  const [category, ...attributes] = key.slice(1, -1).split(DELIMITER);
  if (category.length === 0) {
    throw new InvalidArgumentError(`composite key has an empty category: ${JSON.stringify(key)}`);
  }
  return { category, attributes };
}

export function isCompositeKey(key: string): boolean {
  return key.startsWith(COMPOSITE_KEY_NAMESPACE);
}

/** Human-readable form of a world-state key, for messages. */
export function describeKey(key: string): string {
  if (!isCompositeKey(key)) return key;
  if (!key.endsWith(DELIMITER)) return JSON.stringify(key);
  const [category, ...attributes] = key.slice(1, -1).split(DELIMITER);
  return `${category}(${attributes.join(', ')})`;
}
