// Versioned attribute definitions
//
// Each entity kind declares the exact set of attributes that are versioned,
// which of them take part in the content hash, and the definition revision
// that introduced each one. Historical rows written before a field existed
// simply lack it; readers report such fields as unknown instead of guessing.

import type { z } from 'zod';
import type { EntityKind } from '../types/entities.js';
import type { JsonValue } from '../types/common.js';

/**
 * A zod schema producing a JSON value. Input is left open so schemas with
 * defaults (whose input admits undefined) fit.
 */
export type FieldSchema<T extends JsonValue = JsonValue> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type VersionedField<T extends JsonValue = JsonValue> = {
  schema: FieldSchema<T>;

  /**
   * Volatile fields (display caches, previews) are stored in history but
   * excluded from the content hash.
   */
  volatile: boolean;

  /**
   * Definition revision that introduced the field
   */
  since: number;

  description?: string;
};

export type FieldOptions = {
  volatile?: boolean;
  since?: number;
  description?: string;
};

export function field<T extends JsonValue>(
  schema: FieldSchema<T>,
  options: FieldOptions = {}
): VersionedField<T> {
  return {
    schema,
    volatile: options.volatile ?? false,
    since: options.since ?? 1,
    description: options.description,
  };
}

export type EntityTypeDefinition = {
  kind: EntityKind;
  title: string;

  /**
   * Highest `since` among the fields; stamped on every shadow record
   */
  revision: number;

  fields: Readonly<Record<string, VersionedField>>;
};

export type EntityTypeRegistry = Readonly<Record<EntityKind, EntityTypeDefinition>>;

export function defineEntityType(input: {
  kind: EntityKind;
  title: string;
  fields: Record<string, VersionedField>;
}): EntityTypeDefinition {
  const revision = Math.max(1, ...Object.values(input.fields).map((f) => f.since));
  return {
    kind: input.kind,
    title: input.title,
    revision,
    fields: { ...input.fields },
  };
}

/**
 * Add fields to an existing definition. New fields must carry a `since`
 * above the base revision so older history is recognisably older.
 */
export function extendEntityType(
  base: EntityTypeDefinition,
  fields: Record<string, VersionedField>
): EntityTypeDefinition {
  for (const [name, spec] of Object.entries(fields)) {
    if (Object.hasOwn(base.fields, name)) {
      throw new Error(`Field "${name}" already exists on ${base.kind}`);
    }
    if (spec.since <= base.revision) {
      throw new Error(
        `Field "${name}" must be introduced after revision ${base.revision} of ${base.kind}`
      );
    }
  }
  return defineEntityType({
    kind: base.kind,
    title: base.title,
    fields: { ...base.fields, ...fields },
  });
}

/**
 * Names of the fields that make up the content hash, sorted.
 */
export function hashedFieldNames(definition: EntityTypeDefinition): string[] {
  return Object.entries(definition.fields)
    .filter(([, spec]) => !spec.volatile)
    .map(([name]) => name)
    .sort();
}
