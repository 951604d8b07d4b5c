import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import { SchemaDefinitionError } from '../src/agents/errors';
import { buildMigrationSql } from '../src/db/migrations';
import {
  buildRecordsResponseSchema,
  fromStorageValue,
  getField,
  isMajorField,
  loadRecordSchema,
  normalizeRecord,
  parseRecordSchema,
  recordsFromStorage,
  recordsToStorage,
  storageText,
  toStorageValue,
  type FieldSpec,
} from '../src/schema/recordSchema';
import { TEST_SCHEMA_DOCUMENT, testSchema } from './utils/fakes';

function schemaWithItems(items: Record<string, unknown>) {
  return { properties: { records: { type: 'array', items } } };
}

function field(schema: ReturnType<typeof testSchema>, name: string): FieldSpec {
  const found = getField(schema, name);
  if (!found) throw new Error(`missing field ${name}`);
  return found;
}

describe('parseRecordSchema', () => {
  it('reads fields, types, required and unique fields', () => {
    const schema = testSchema();
    expect(schema.fieldNames).toEqual([
      'species',
      'interaction',
      'location',
      'individual_count',
      'sentences',
      'confirmed',
    ]);
    expect(schema.fields.map((f) => f.type)).toEqual([
      'string',
      'string',
      'string',
      'integer',
      'array',
      'boolean',
    ]);
    expect(schema.required).toEqual(['species', 'interaction']);
    expect(schema.uniqueFields).toEqual(['species', 'interaction', 'location']);
    expect(schema.version).toHaveLength(12);
    expect(getField(schema, 'species')?.description).toBe('Scientific name');
  });

  it('gives the same version for the same document', () => {
    expect(parseRecordSchema(TEST_SCHEMA_DOCUMENT).version).toBe(testSchema().version);
  });

  it('marks unique and required fields as major', () => {
    const schema = testSchema();
    expect(isMajorField(schema, 'location')).toBe(true);
    expect(isMajorField(schema, 'species')).toBe(true);
    expect(isMajorField(schema, 'sentences')).toBe(false);
  });

  it('rejects records that are not an array', () => {
    expect(() =>
      parseRecordSchema({ properties: { records: { type: 'object', items: { properties: { a: {} } } } } }, 's.json')
    ).toThrow('Invalid record schema (s.json): properties.records must be of type "array"');
  });

  it('rejects a document without records.items.properties', () => {
    expect(() => parseRecordSchema({ properties: {} })).toThrow(SchemaDefinitionError);
  });

  it('rejects field names that are not identifiers', () => {
    expect(() =>
      parseRecordSchema(schemaWithItems({ properties: { 'bad-name': {} }, 'x-unique-fields': ['bad-name'] }))
    ).toThrow('field name "bad-name" is not a valid column identifier');
  });

  it('rejects field names that collide with system columns', () => {
    expect(() =>
      parseRecordSchema(schemaWithItems({ properties: { record_id: {} }, 'x-unique-fields': ['record_id'] }))
    ).toThrow('field name "record_id" collides with a system column');
  });

  it('requires a non-empty list of known unique fields', () => {
    expect(() => parseRecordSchema(schemaWithItems({ properties: { a: {} } }))).toThrow(
      'records.items must declare a non-empty "x-unique-fields" list'
    );
    expect(() =>
      parseRecordSchema(schemaWithItems({ properties: { a: {} }, 'x-unique-fields': ['b'] }))
    ).toThrow('x-unique-fields names unknown field "b"');
  });

  it('rejects unknown required fields and unsupported types', () => {
    expect(() =>
      parseRecordSchema(schemaWithItems({ properties: { a: {} }, required: ['z'], 'x-unique-fields': ['a'] }))
    ).toThrow('required names unknown field "z"');
    expect(() =>
      parseRecordSchema(schemaWithItems({ properties: { a: { type: 'date' } }, 'x-unique-fields': ['a'] }))
    ).toThrow('field "a" has unsupported type "date"');
  });

  it('defaults untyped fields to string', () => {
    const schema = parseRecordSchema(schemaWithItems({ properties: { a: {} }, 'x-unique-fields': ['a'] }));
    expect(schema.fields).toEqual([{ name: 'a', type: 'string', description: undefined }]);
  });

  it('loads the bundled schema file', async () => {
    const schema = await loadRecordSchema(path.join(__dirname, '../schemas/schema.json'));
    expect(schema.fields).toHaveLength(10);
    expect(schema.required).toEqual(['bat_species_scientific_name', 'interaction_type']);
    expect(getField(schema, 'organisms_identifiable')?.type).toBe('boolean');
  });

  it('reports a missing schema file as a schema error', async () => {
    await expect(loadRecordSchema(path.join(__dirname, 'no-such-schema.json'))).rejects.toThrow(
      SchemaDefinitionError
    );
  });
});

describe('normalizeRecord', () => {
  it('restricts to schema fields and coerces values', () => {
    const schema = testSchema();
    const record = normalizeRecord(
      schema,
      {
        species: 'Myotis myotis',
        interaction: 'predation',
        individual_count: '12',
        sentences: 'Bats ate moths.',
        confirmed: 'true',
        extra: 'dropped',
      },
      0
    );
    expect(record).toEqual({
      species: 'Myotis myotis',
      interaction: 'predation',
      location: null,
      individual_count: 12,
      sentences: ['Bats ate moths.'],
      confirmed: true,
    });
  });

  it('rejects a record with a blank required field', () => {
    const schema = testSchema();
    expect(() => normalizeRecord(schema, { species: 'Myotis', interaction: '  ' }, 1)).toThrow(
      'Record 2 is missing required field "interaction"'
    );
  });
});

describe('buildRecordsResponseSchema', () => {
  it('reports type mismatches per field', () => {
    const result = buildRecordsResponseSchema(testSchema()).safeParse({
      records: [{ species: 'Myotis', individual_count: 'many' }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['records', 0, 'individual_count']);
      expect(result.error.issues[0]?.message).toBe('expected integer');
    }
  });

  it('accepts values that coerce to the declared type', () => {
    const result = buildRecordsResponseSchema(testSchema()).safeParse({
      records: [{ species: 'Myotis', individual_count: '7', confirmed: 1, location: null }],
    });
    expect(result.success).toBe(true);
  });
});

describe('storage mapping', () => {
  const schema = testSchema();

  it('converts values to column values', () => {
    expect(toStorageValue(field(schema, 'sentences'), ['a', 'b'])).toBe('["a","b"]');
    expect(toStorageValue(field(schema, 'confirmed'), true)).toBe(1);
    expect(toStorageValue(field(schema, 'confirmed'), false)).toBe(0);
    expect(toStorageValue(field(schema, 'individual_count'), '4')).toBe(4);
    expect(toStorageValue(field(schema, 'location'), null)).toBeNull();
  });

  it('reads column values back', () => {
    expect(fromStorageValue(field(schema, 'sentences'), '["a"]')).toEqual(['a']);
    expect(fromStorageValue(field(schema, 'sentences'), 'not json')).toBe('not json');
    expect(fromStorageValue(field(schema, 'confirmed'), 1)).toBe(true);
    expect(fromStorageValue(field(schema, 'individual_count'), '12')).toBe(12);
    expect(fromStorageValue(field(schema, 'species'), null)).toBeNull();
  });

  it('gives a text form for diffs', () => {
    expect(storageText(field(schema, 'individual_count'), 12)).toBe('12');
    expect(storageText(field(schema, 'confirmed'), true)).toBe('1');
    expect(storageText(field(schema, 'location'), undefined)).toBeNull();
  });

  it('round-trips a whole record', () => {
    const values = {
      species: 'Myotis',
      interaction: 'roosting',
      location: 'Kenya',
      individual_count: 3,
      sentences: ['Three bats roosted.'],
      confirmed: false,
    };
    expect(recordsFromStorage(schema, recordsToStorage(schema, values))).toEqual(values);
  });
});

describe('buildMigrationSql', () => {
  it('creates one typed column per field', () => {
    const sql = buildMigrationSql(testSchema());
    expect(sql.startsWith(`-- record schema version ${testSchema().version}`)).toBe(true);
    expect(sql).toContain('  "individual_count" INTEGER,');
    expect(sql).toContain('  "confirmed" SMALLINT,');
    expect(sql).toContain('  "sentences" TEXT,');
    expect(sql).toContain('ALTER TABLE records ADD COLUMN IF NOT EXISTS "location" TEXT;');
    expect(sql).toContain('CREATE TABLE IF NOT EXISTS record_edits (');
  });
});
