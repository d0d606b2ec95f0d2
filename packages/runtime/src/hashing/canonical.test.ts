// Tests for canonical JSON and hashing

import { describe, it, expect } from 'vitest';
import { canonicalize, hashCanonical } from './canonical.js';
import { ValidationError } from '../errors.js';

describe('canonicalize', () => {
  it('should sort object keys at every depth', () => {
    expect(canonicalize({ z: { b: true, a: false }, m: 1 })).toBe('{"m":1,"z":{"a":false,"b":true}}');
  });

  it('should drop null and undefined members from objects', () => {
    expect(canonicalize({ b: 1, a: null, c: undefined })).toBe('{"b":1}');
  });

  it('should keep array order and nulls inside arrays', () => {
    expect(canonicalize([3, null, 'x', 1])).toBe('[3,null,"x",1]');
  });

  it('should write negative zero as zero', () => {
    expect(canonicalize({ x: -0 })).toBe('{"x":0}');
  });

  it('should write numbers in shortest round-trip form', () => {
    expect(canonicalize([0.1, 1.5, 1e21, 100])).toBe('[0.1,1.5,1e+21,100]');
  });

  it('should escape strings as JSON', () => {
    expect(canonicalize({ 'a"b': 'line\nbreak' })).toBe('{"a\\"b":"line\\nbreak"}');
  });

  it('should reject non-finite numbers with their path', () => {
    expect(() => canonicalize({ a: [Infinity] })).toThrow(ValidationError);
    expect(() => canonicalize({ a: [Infinity] })).toThrow('Cannot hash non-finite number at $.a[0]');
    expect(() => canonicalize(NaN)).toThrow('Cannot hash non-finite number at $');
  });

  it('should reject values that are not JSON', () => {
    expect(() => canonicalize(10n)).toThrow('Cannot hash bigint at $');
    expect(() => canonicalize({ when: new Date(0) })).toThrow(
      'Cannot hash non-plain object at $.when'
    );
  });
});

describe('hashCanonical', () => {
  it('should produce the SHA-256 of the canonical form', () => {
    expect(hashCanonical(null)).toBe(
      '74234e98afe7498fb5daf1f36ac2d78acc339464f950703b8c019892f982b90b'
    );
    expect(hashCanonical({ b: [true, null, 'x'], a: 1 })).toBe(
      'eca8cfb31ab74533e1eb2f4c74d2d55dfe3c79ac704787e54be8647ea7777eb1'
    );
  });

  it('should not depend on key insertion order', () => {
    expect(hashCanonical({ a: 1, b: { c: 2, d: 3 } })).toBe(
      hashCanonical({ b: { d: 3, c: 2 }, a: 1 })
    );
  });

  it('should treat null and absent members alike', () => {
    expect(hashCanonical({ a: 1, b: null })).toBe(hashCanonical({ a: 1 }));
  });
});
