// Content hashing
export { canonicalize, hashCanonical } from './canonical.js';
export { ContentHasher } from './hasher.js';
