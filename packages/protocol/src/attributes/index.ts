export { jsonValueSchema, jsonObjectSchema, isPlainObject } from './json.js';
export {
  field,
  defineEntityType,
  extendEntityType,
  hashedFieldNames,
  type FieldSchema,
  type FieldOptions,
  type VersionedField,
  type EntityTypeDefinition,
  type EntityTypeRegistry,
} from './definition.js';
export {
  parseAttributes,
  materializeAttributes,
  indexedColumns,
  type AttributeIssue,
  type AttributeIssueCode,
  type ParseAttributesResult,
  type MaterializedAttributes,
} from './parse.js';
export { datasetType, trainedModelType, taskType, entityTypes } from './builtin.js';
