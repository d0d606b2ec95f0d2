// Canonical JSON
//
// One byte sequence per logical value:
// - object keys sorted by UTF-16 code unit
// - null and absent are the same, so null members are dropped from objects
// - -0 is written as 0; other numbers in shortest round-trip form
// - array order is kept, nulls in arrays stay
// Non-finite numbers and non-JSON values are rejected.

import { createHash } from 'node:crypto';
import type { ContentHash } from '@strata/protocol';
import { ValidationError } from '../errors.js';

export function canonicalize(value: unknown): string {
  return write(value, '$');
}

function write(value: unknown, path: string): string {
  if (value === null || value === undefined) return 'null';

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'string':
      return JSON.stringify(value);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new ValidationError(`Cannot hash non-finite number at ${path}`, {
          field: path,
          details: { value: String(value) },
        });
      }
      // JSON.stringify(-0) is already "0"
      return JSON.stringify(value);
    case 'object':
      if (Array.isArray(value)) {
        return `[${value.map((item, index) => write(item, `${path}[${index}]`)).join(',')}]`;
      }
      return writeObject(value, path);
    default:
      throw new ValidationError(`Cannot hash ${typeof value} at ${path}`, { field: path });
  }
}

function writeObject(value: object, path: string): string {
  const prototype = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) {
    throw new ValidationError(`Cannot hash non-plain object at ${path}`, { field: path });
  }

  const members: string[] = [];
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, member] of entries) {
    if (member === null || member === undefined) continue;
    members.push(`${JSON.stringify(key)}:${write(member, `${path}.${key}`)}`);
  }
  return `{${members.join(',')}}`;
}

/**
 * SHA-256 of the canonical form, lowercase hex.
 */
export function hashCanonical(value: unknown): ContentHash {
  return createHash('sha256').update(canonicalize(value), 'utf8').digest('hex');
}
