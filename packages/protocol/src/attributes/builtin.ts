// Built-in entity type definitions for the catalog

import { z } from 'zod';
import { defineEntityType, field, type EntityTypeRegistry } from './definition.js';
import { jsonObjectSchema, jsonValueSchema } from './json.js';

const requiredText = () => z.string().min(1);
const optionalText = () => z.string().nullable().default(null);
const optionalJson = () => jsonValueSchema.nullable().default(null);

export const datasetType = defineEntityType({
  kind: 'dataset',
  title: 'Dataset',
  fields: {
    name: field(requiredText()),
    isPrivate: field(z.boolean().default(false), { since: 2 }),
    dataPath: field(requiredText(), { description: 'Storage location of the data' }),
    format: field(requiredText()),
    metadataVersion: field(optionalText()),
    datasetMetadata: field(optionalJson()),
    longDescription: field(optionalText()),
    assetOrigin: field(optionalText()),
    croissantMetadata: field(optionalJson(), { since: 3 }),
    preview: field(optionalText(), {
      volatile: true,
      description: 'Base64 preview payload rendered by the catalog UI',
    }),
    previewType: field(optionalText(), { volatile: true }),
  },
});

export const trainedModelType = defineEntityType({
  kind: 'trained_model',
  title: 'Trained model',
  fields: {
    name: field(requiredText()),
    isPrivate: field(z.boolean().default(false), { since: 2 }),
    modelPath: field(requiredText()),
    metadataVersion: field(optionalText()),
    modelMetadata: field(optionalJson()),
    longDescription: field(optionalText()),
    modelAttributes: field(optionalJson()),
    assetOrigin: field(optionalText()),
  },
});

export const taskType = defineEntityType({
  kind: 'task',
  title: 'Task',
  fields: {
    name: field(requiredText()),
    isPrivate: field(z.boolean().default(false), { since: 2 }),
    workflow: field(jsonObjectSchema),
    version: field(optionalText()),
    description: field(optionalText()),
    hasFileUploads: field(z.boolean().default(false), { since: 2 }),
  },
});

export const entityTypes: EntityTypeRegistry = {
  dataset: datasetType,
  trained_model: trainedModelType,
  task: taskType,
};
