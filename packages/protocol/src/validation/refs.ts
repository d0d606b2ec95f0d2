// Version reference parsing
//
// A version ref names one state of an entity: a 64-character content hash,
// a tag, or "~N" for the N-th version (0 = oldest, negative counts back from
// the newest). Tag names are restricted so the three forms never overlap.

import type { ContentHash } from '../types/common.js';

const CONTENT_HASH_PATTERN = /^[0-9a-f]{64}$/;
const INDEX_REF_PATTERN = /^~(-?\d+)$/;

export type VersionRef =
  | { type: 'hash'; contentHash: ContentHash }
  | { type: 'tag'; tagName: string }
  | { type: 'index'; index: number };

export function isContentHash(value: string): boolean {
  return CONTENT_HASH_PATTERN.test(value);
}

/**
 * Check a tag name, returning the reason it is invalid or null when valid.
 */
export function validateTagName(name: string): string | null {
  if (name.length === 0) return 'Tag name must not be empty';
  if (name.trim() !== name) return 'Tag name must not start or end with whitespace';
  if (name.startsWith('~')) return 'Tag name must not start with "~"';
  if (isContentHash(name)) return 'Tag name must not look like a content hash';
  return null;
}

/**
 * Parse a version ref. Returns null for malformed refs (empty, or "~" not
 * followed by an integer).
 */
export function parseVersionRef(ref: string): VersionRef | null {
  if (ref.length === 0) return null;

  if (ref.startsWith('~')) {
    const match = INDEX_REF_PATTERN.exec(ref);
    if (!match) return null;
    const index = Number.parseInt(match[1], 10);
    return Number.isSafeInteger(index) ? { type: 'index', index } : null;
  }

  if (isContentHash(ref)) {
    return { type: 'hash', contentHash: ref };
  }

  return { type: 'tag', tagName: ref };
}
