// Tests for attribute parsing and materialization

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { datasetType, taskType } from './builtin.js';
import { defineEntityType, field } from './definition.js';
import { parseAttributes, materializeAttributes, indexedColumns } from './parse.js';

// --- Test Fixtures ---

function createDatasetInput(): Record<string, unknown> {
  return {
    name: 'Iris',
    dataPath: 'gs://catalog/iris.csv',
    format: 'csv',
  };
}

// --- Tests ---

describe('parseAttributes', () => {
  it('should fill defaults for omitted optional fields', () => {
    const result = parseAttributes(datasetType, createDatasetInput());

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.attributes).toEqual({
      name: 'Iris',
      isPrivate: false,
      dataPath: 'gs://catalog/iris.csv',
      format: 'csv',
      metadataVersion: null,
      datasetMetadata: null,
      longDescription: null,
      assetOrigin: null,
      croissantMetadata: null,
      preview: null,
      previewType: null,
    });
  });

  it('should reject attributes the definition does not declare', () => {
    const result = parseAttributes(datasetType, { ...createDatasetInput(), colour: 'blue' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual([
      { path: 'colour', message: 'Unknown attribute for dataset', code: 'UNKNOWN_ATTRIBUTE' },
    ]);
  });

  it('should report missing required fields by name', () => {
    const { format: _format, ...input } = createDatasetInput();
    const result = parseAttributes(datasetType, input);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0].path).toBe('format');
    expect(result.issues[0].code).toBe('INVALID_VALUE');
  });

  it('should reject non-object input', () => {
    const result = parseAttributes(datasetType, ['not', 'an', 'object']);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues[0].code).toBe('INVALID_TYPE');
  });

  it('should reject non-finite numbers inside JSON fields', () => {
    const result = parseAttributes(datasetType, {
      ...createDatasetInput(),
      datasetMetadata: { rows: Number.NaN },
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues.every((issue) => issue.path.startsWith('datasetMetadata'))).toBe(true);
  });

  it('should require a workflow object for tasks', () => {
    const ok = parseAttributes(taskType, { name: 'summarize', workflow: { steps: ['a', 'b'] } });
    const bad = parseAttributes(taskType, { name: 'summarize', workflow: 'a,b' });

    expect(ok.success).toBe(true);
    expect(bad.success).toBe(false);
  });
});

describe('materializeAttributes', () => {
  const definition = defineEntityType({
    kind: 'task',
    title: 'Task',
    fields: {
      name: field(z.string()),
      hasFileUploads: field(z.boolean().default(false), { since: 2 }),
    },
  });

  it('should report fields missing from a historical row as unknown', () => {
    const result = materializeAttributes(definition, { name: 'summarize' });

    expect(result.attributes).toEqual({ name: 'summarize', hasFileUploads: null });
    expect(result.unknownFields).toEqual(['hasFileUploads']);
  });

  it('should keep stored values for fields no longer declared', () => {
    const result = materializeAttributes(definition, {
      name: 'summarize',
      hasFileUploads: true,
      legacyOwner: 'team-a',
    });

    expect(result.attributes).toEqual({
      name: 'summarize',
      hasFileUploads: true,
      legacyOwner: 'team-a',
    });
    expect(result.unknownFields).toEqual([]);
  });

  it('should treat a stored null as known', () => {
    const result = materializeAttributes(definition, { name: 'summarize', hasFileUploads: null });

    expect(result.unknownFields).toEqual([]);
  });
});

describe('indexedColumns', () => {
  it('should mirror name and privacy from attributes', () => {
    expect(indexedColumns({ name: 'Iris', isPrivate: true })).toEqual({
      name: 'Iris',
      isPrivate: true,
    });
  });

  it('should fall back when the attributes lack them', () => {
    expect(indexedColumns({ isPrivate: 'yes' })).toEqual({ name: '', isPrivate: false });
  });
});
