// @strata/protocol
// Shared types for versioned catalog entities and the attribute definitions
// that describe what each entity kind records in its history.

export * from './types/index.js';
export * from './attributes/index.js';
export {
  isContentHash,
  validateTagName,
  parseVersionRef,
  type VersionRef,
} from './validation/refs.js';
