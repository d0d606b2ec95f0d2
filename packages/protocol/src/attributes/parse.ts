// Attribute parsing and materialization

import type { JsonObject } from '../types/common.js';
import type { EntityTypeDefinition } from './definition.js';
import { isPlainObject } from './json.js';

export type AttributeIssueCode = 'INVALID_TYPE' | 'INVALID_VALUE' | 'UNKNOWN_ATTRIBUTE';

export type AttributeIssue = {
  path: string;
  message: string;
  code: AttributeIssueCode;
};

export type ParseAttributesResult =
  | { success: true; attributes: JsonObject }
  | { success: false; issues: AttributeIssue[] };

/**
 * Validate a full attribute record against a definition, filling defaults.
 * Attributes the definition does not declare are rejected.
 */
export function parseAttributes(
  definition: EntityTypeDefinition,
  input: unknown
): ParseAttributesResult {
  if (!isPlainObject(input)) {
    return {
      success: false,
      issues: [{ path: '', message: 'Attributes must be an object', code: 'INVALID_TYPE' }],
    };
  }

  const issues: AttributeIssue[] = [];

  for (const key of Object.keys(input)) {
    if (!Object.hasOwn(definition.fields, key)) {
      issues.push({
        path: key,
        message: `Unknown attribute for ${definition.kind}`,
        code: 'UNKNOWN_ATTRIBUTE',
      });
    }
  }

  const attributes: JsonObject = {};
  for (const [name, spec] of Object.entries(definition.fields)) {
    const parsed = spec.schema.safeParse(input[name]);
    if (parsed.success) {
      attributes[name] = parsed.data;
    } else {
      for (const issue of parsed.error.issues) {
        issues.push({
          path: [name, ...issue.path].join('.'),
          message: issue.message,
          code: 'INVALID_VALUE',
        });
      }
    }
  }

  return issues.length > 0 ? { success: false, issues } : { success: true, attributes };
}

export type MaterializedAttributes = {
  attributes: JsonObject;
  unknownFields: string[];
};

/**
 * Complete a stored attribute record against the current definition.
 *
 * Declared fields the record lacks come back as null and are listed in
 * `unknownFields`. Stored values for fields the definition no longer declares
 * are passed through untouched.
 */
export function materializeAttributes(
  definition: EntityTypeDefinition,
  stored: JsonObject
): MaterializedAttributes {
  const attributes: JsonObject = { ...stored };
  const unknownFields: string[] = [];

  for (const name of Object.keys(definition.fields)) {
    if (!Object.hasOwn(stored, name)) {
      attributes[name] = null;
      unknownFields.push(name);
    }
  }

  return { attributes, unknownFields };
}

/**
 * Columns mirrored from attributes onto the live entity row.
 */
export function indexedColumns(attributes: JsonObject): { name: string; isPrivate: boolean } {
  const { name, isPrivate } = attributes;
  return {
    name: typeof name === 'string' ? name : '',
    isPrivate: isPrivate === true,
  };
}
