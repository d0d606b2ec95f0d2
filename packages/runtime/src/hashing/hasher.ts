// Content hasher
//
// Digest of an entity state. Only the entity's identity and its hashed
// (non-volatile, declared) attributes take part, so volatile display fields
// and fields the definition does not know never change a digest.

import type { ContentHash, EntityKind, EntityTypeRegistry, Id, JsonObject } from '@strata/protocol';
import { entityTypes, hashedFieldNames } from '@strata/protocol';
import { hashCanonical } from './canonical.js';

export class ContentHasher {
  private readonly hashedFields: Record<EntityKind, string[]>;

  constructor(registry: EntityTypeRegistry = entityTypes) {
    this.hashedFields = {
      dataset: hashedFieldNames(registry.dataset),
      trained_model: hashedFieldNames(registry.trained_model),
      task: hashedFieldNames(registry.task),
    };
  }

  /**
   * The value that is hashed for an entity state
   */
  canonicalForm(kind: EntityKind, entityId: Id, attributes: JsonObject): JsonObject {
    const hashed: JsonObject = {};
    for (const name of this.hashedFields[kind]) {
      const value = attributes[name];
      if (value !== undefined && value !== null) {
        hashed[name] = value;
      }
    }
    return { entityId, kind, attributes: hashed };
  }

  hash(kind: EntityKind, entityId: Id, attributes: JsonObject): ContentHash {
    return hashCanonical(this.canonicalForm(kind, entityId, attributes));
  }
}
