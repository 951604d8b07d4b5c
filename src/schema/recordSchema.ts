import * as fs from 'fs/promises';
import { z } from 'zod';
import { SchemaDefinitionError } from '../agents/errors';
import { sha256, stableStringify } from '../utils/cache';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export type RecordValues = Record<string, JsonValue>;

export const FIELD_TYPES = ['string', 'integer', 'number', 'boolean', 'array', 'object'] as const;
export type FieldType = (typeof FIELD_TYPES)[number];

export interface FieldSpec {
  name: string;
  type: FieldType;
  description?: string;
}

/**
 * Typed view of the user-supplied record JSON Schema, built once per run and
 * handed to every component that touches record fields.
 */
export interface RecordSchema {
  fields: FieldSpec[];
  fieldNames: string[];
  required: string[];
  uniqueFields: string[];
  /** `properties.records` of the source document, used in prompts. */
  recordsJsonSchema: Record<string, unknown>;
  /** `properties.records.items.properties` of the source document. */
  fieldsJsonSchema: Record<string, unknown>;
  version: string;
}

/** Columns every record row carries regardless of the schema. */
export const SYSTEM_RECORD_COLUMNS = [
  'id',
  'document_id',
  'record_id',
  'added_by_user',
  'deleted_by_user',
  'human_edited',
  'llm_model',
  'prompt_hash',
  'extracted_at',
] as const;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const PropertyDefinition = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
  })
  .passthrough();

const RawSchemaDocument = z
  .object({
    properties: z
      .object({
        records: z
          .object({
            type: z.string().optional(),
            items: z
              .object({
                properties: z.record(PropertyDefinition),
                required: z.array(z.string()).optional(),
                'x-unique-fields': z.array(z.string()).optional(),
              })
              .passthrough(),
          })
          .passthrough(),
      })
      .passthrough(),
  })
  .passthrough();

function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some((t) => t === value);
}

function resolveFieldType(name: string, declared: string | string[] | undefined, source?: string): FieldType {
  if (declared === undefined) return 'string';
  const candidates = Array.isArray(declared) ? declared.filter((t) => t !== 'null') : [declared];
  const first = candidates[0];
  if (first === undefined) return 'string';
  if (!isFieldType(first)) {
    throw new SchemaDefinitionError(`field "${name}" has unsupported type "${first}"`, source);
  }
  return first;
}

export function parseRecordSchema(raw: unknown, source?: string): RecordSchema {
  const parsed = RawSchemaDocument.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : 'root';
    throw new SchemaDefinitionError(
      `expected properties.records.items.properties (${where}: ${issue?.message ?? 'invalid'})`,
      source
    );
  }

  const records = parsed.data.properties.records;
  if (records.type !== undefined && records.type !== 'array') {
    throw new SchemaDefinitionError('properties.records must be of type "array"', source);
  }

  const items = records.items;
  const fields: FieldSpec[] = [];
  for (const [name, definition] of Object.entries(items.properties)) {
    if (!IDENTIFIER.test(name)) {
      throw new SchemaDefinitionError(`field name "${name}" is not a valid column identifier`, source);
    }
    if (SYSTEM_RECORD_COLUMNS.some((column) => column === name.toLowerCase())) {
      throw new SchemaDefinitionError(`field name "${name}" collides with a system column`, source);
    }
    fields.push({
      name,
      type: resolveFieldType(name, definition.type, source),
      description: definition.description,
    });
  }

  if (fields.length === 0) {
    throw new SchemaDefinitionError('records.items declares no fields', source);
  }

  const fieldNames = fields.map((f) => f.name);
  const uniqueFields = items['x-unique-fields'] ?? [];
  if (uniqueFields.length === 0) {
    throw new SchemaDefinitionError('records.items must declare a non-empty "x-unique-fields" list', source);
  }
  for (const name of uniqueFields) {
    if (!fieldNames.includes(name)) {
      throw new SchemaDefinitionError(`x-unique-fields names unknown field "${name}"`, source);
    }
  }

  const required = items.required ?? [];
  for (const name of required) {
    if (!fieldNames.includes(name)) {
      throw new SchemaDefinitionError(`required names unknown field "${name}"`, source);
    }
  }

  return {
    fields,
    fieldNames,
    required,
    uniqueFields,
    recordsJsonSchema: records,
    fieldsJsonSchema: items.properties,
    version: sha256(stableStringify(records)).slice(0, 12),
  };
}

export async function loadRecordSchema(filePath: string): Promise<RecordSchema> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new SchemaDefinitionError(
      `cannot read schema file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new SchemaDefinitionError(
      `schema file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
  return parseRecordSchema(raw, filePath);
}

export function getField(schema: RecordSchema, name: string): FieldSpec | undefined {
  return schema.fields.find((f) => f.name === name);
}

export function isMajorField(schema: RecordSchema, name: string): boolean {
  return schema.uniqueFields.includes(name) || schema.required.includes(name);
}

function acceptsValue(type: FieldType, value: JsonValue): boolean {
  if (value === null) return true;
  switch (type) {
    case 'string':
      return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
    case 'integer':
    case 'number':
      return typeof value === 'number' || (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value)));
    case 'boolean':
      return typeof value === 'boolean' || value === 'true' || value === 'false' || value === 0 || value === 1;
    case 'array':
      return true;
    case 'object':
      return typeof value === 'object' && !Array.isArray(value);
  }
}

export type ExtractedRecord = RecordValues;

/**
 * zod schema for an LLM response of the form `{ records: [...] }`. Type
 * mismatches are reported per field so the agent can feed them back.
 */
export function buildRecordsResponseSchema(schema: RecordSchema): z.ZodType<{ records: ExtractedRecord[] }> {
  const item = z.record(JsonValueSchema).superRefine((record, ctx) => {
    for (const field of schema.fields) {
      const value = record[field.name];
      if (value === undefined) continue;
      if (!acceptsValue(field.type, value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field.name],
          message: `expected ${field.type}`,
        });
      }
    }
  });
  return z.object({ records: z.array(item) });
}

export class RecordNormalizationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordNormalizationError';
  }
}

export function coerceFieldValue(type: FieldType, value: JsonValue): JsonValue {
  if (value === null) return null;
  switch (type) {
    case 'string':
      return typeof value === 'string' ? value : typeof value === 'object' ? JSON.stringify(value) : String(value);
    case 'integer': {
      const n = typeof value === 'number' ? value : Number(value);
      return Number.isFinite(n) ? Math.trunc(n) : null;
    }
    case 'number': {
      const n = typeof value === 'number' ? value : Number(value);
      return Number.isFinite(n) ? n : null;
    }
    case 'boolean':
      return value === true || value === 'true' || value === 1 || value === '1';
    case 'array':
      return Array.isArray(value) ? value : [value];
    case 'object':
      return value;
  }
}

function isEmptyValue(value: JsonValue | undefined): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim() === '') ||
    (Array.isArray(value) && value.length === 0)
  );
}

/**
 * Restricts a raw record to schema fields, coerces values to their declared
 * types (a scalar given for an array field becomes a one-element array) and
 * enforces `required`.
 */
export function normalizeRecord(schema: RecordSchema, raw: RecordValues, index: number): RecordValues {
  const out: RecordValues = {};
  for (const field of schema.fields) {
    const value = raw[field.name];
    out[field.name] = value === undefined ? null : coerceFieldValue(field.type, value);
  }
  for (const name of schema.required) {
    if (isEmptyValue(out[name])) {
      throw new RecordNormalizationError(`Record ${index + 1} is missing required field "${name}"`);
    }
  }
  return out;
}

export type StoredValue = string | number | null;

export function toStorageValue(field: FieldSpec, value: JsonValue | undefined): StoredValue {
  if (value === undefined || value === null) return null;
  switch (field.type) {
    case 'array':
    case 'object':
      return typeof value === 'string' ? value : JSON.stringify(value);
    case 'boolean':
      return coerceFieldValue('boolean', value) === true ? 1 : 0;
    case 'integer':
    case 'number': {
      const n = coerceFieldValue(field.type, value);
      return typeof n === 'number' ? n : null;
    }
    case 'string':
      return typeof value === 'string' ? value : JSON.stringify(value);
  }
}

export function fromStorageValue(field: FieldSpec, stored: unknown): JsonValue {
  if (stored === undefined || stored === null) return null;
  switch (field.type) {
    case 'array':
    case 'object': {
      if (typeof stored !== 'string') {
        const parsed = JsonValueSchema.safeParse(stored);
        return parsed.success ? parsed.data : null;
      }
      try {
        const parsed = JsonValueSchema.safeParse(JSON.parse(stored));
        return parsed.success ? parsed.data : stored;
      } catch {
        return stored;
      }
    }
    case 'boolean':
      return stored === true || stored === 1 || stored === '1' || stored === 'true';
    case 'integer':
    case 'number': {
      const n = Number(stored);
      return Number.isFinite(n) ? n : null;
    }
    case 'string':
      return String(stored);
  }
}

/** Text form used for diffing and the edit audit log. */
export function storageText(field: FieldSpec, value: JsonValue | undefined): string | null {
  const stored = toStorageValue(field, value);
  return stored === null ? null : String(stored);
}

export function recordsToStorage(schema: RecordSchema, values: RecordValues): Record<string, StoredValue> {
  const row: Record<string, StoredValue> = {};
  for (const field of schema.fields) {
    row[field.name] = toStorageValue(field, values[field.name]);
  }
  return row;
}

export function recordsFromStorage(schema: RecordSchema, row: Record<string, unknown>): RecordValues {
  const values: RecordValues = {};
  for (const field of schema.fields) {
    values[field.name] = fromStorageValue(field, row[field.name]);
  }
  return values;
}
