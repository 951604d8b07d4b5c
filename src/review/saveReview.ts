import type { NewRecord, NewRecordEdit, PipelineStore, RecordRow } from '../db/types';
import { generateRecordIds, recordIdPrefix } from '../pipeline/recordIds';
import {
  coerceFieldValue,
  storageText,
  type RecordSchema,
  type RecordValues,
} from '../schema/recordSchema';

/** A record as submitted by a reviewer; `id` is absent for added rows. */
export interface ReviewedRecord {
  id?: number | null;
  record_id?: string | null;
  fields: RecordValues;
}

export interface ReviewSaveResult {
  edited: number;
  added: number;
  deleted: number;
  edits: number;
}

export class ReviewError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReviewError';
  }
}

function coerceFields(schema: RecordSchema, fields: RecordValues): RecordValues {
  const out: RecordValues = {};
  for (const field of schema.fields) {
    const value = fields[field.name];
    if (value === undefined) continue;
    out[field.name] = value === null ? null : coerceFieldValue(field.type, value);
  }
  return out;
}

/**
 * Persists a reviewer's version of a document's records.
 *
 * Rows are matched on the surrogate `id`. Changed columns are written to the
 * edit log and flag the row `human_edited`; originals missing from the
 * submission are soft-deleted; submitted rows without an id are inserted as
 * `added_by_user`. Without `originalRecords` only `reviewed_at` is set.
 */
export async function saveReview(
  store: PipelineStore,
  schema: RecordSchema,
  documentId: number,
  editedRecords: ReviewedRecord[],
  originalRecords?: RecordRow[],
  now: Date = new Date()
): Promise<ReviewSaveResult> {
  const result: ReviewSaveResult = { edited: 0, added: 0, deleted: 0, edits: 0 };
  const timestamp = now.toISOString();

  if (originalRecords === undefined) {
    await store.updateDocument(documentId, { reviewed_at: timestamp });
    return result;
  }

  const document = await store.getDocument(documentId);
  if (!document) {
    throw new ReviewError(`Document ${documentId} not found`);
  }

  const originalsById = new Map(originalRecords.map((r) => [r.id, r]));
  const submittedIds = new Set<number>();
  for (const record of editedRecords) {
    if (record.id === null || record.id === undefined) continue;
    if (!originalsById.has(record.id)) {
      throw new ReviewError(`Record ${record.id} does not belong to document ${documentId}`);
    }
    submittedIds.add(record.id);
  }

  for (const original of originalRecords) {
    if (original.deleted_by_user || submittedIds.has(original.id)) continue;
    await store.updateRecord(original.id, { deleted_by_user: true });
    result.deleted++;
  }

  const added = editedRecords.filter((r) => r.id === null || r.id === undefined);
  if (added.length > 0) {
    const generated = generateRecordIds(
      recordIdPrefix(document.first_author_lastname, document.publication_year),
      originalRecords.map((r) => r.record_id),
      added.length
    );
    const rows: NewRecord[] = added.map((record, i) => ({
      record_id: record.record_id?.trim() || generated[i],
      fields: coerceFields(schema, record.fields),
      added_by_user: true,
      llm_model: null,
      prompt_hash: null,
      extracted_at: null,
    }));
    await store.insertRecords(documentId, rows);
    result.added = rows.length;
  }

  const edits: NewRecordEdit[] = [];
  for (const record of editedRecords) {
    if (record.id === null || record.id === undefined) continue;
    const original = originalsById.get(record.id);
    if (!original) continue;

    const changed: RecordValues = {};
    const submitted = coerceFields(schema, record.fields);
    for (const field of schema.fields) {
      if (!(field.name in submitted)) continue;
      const before = storageText(field, original.fields[field.name]);
      const after = storageText(field, submitted[field.name]);
      if (before === after) continue;
      changed[field.name] = submitted[field.name] ?? null;
      edits.push({
        document_id: documentId,
        record_id: original.id,
        column_name: field.name,
        original_value: before,
        new_value: after,
        edited_at: timestamp,
      });
    }

    const newRecordId = record.record_id?.trim();
    const recordIdChanged = newRecordId !== undefined && newRecordId !== '' && newRecordId !== original.record_id;
    if (recordIdChanged) {
      edits.push({
        document_id: documentId,
        record_id: original.id,
        column_name: 'record_id',
        original_value: original.record_id,
        new_value: newRecordId,
        edited_at: timestamp,
      });
    }

    if (Object.keys(changed).length > 0 || recordIdChanged) {
      await store.updateRecord(original.id, {
        fields: changed,
        record_id: recordIdChanged ? newRecordId : undefined,
        human_edited: true,
      });
      result.edited++;
    }
  }

  await store.appendRecordEdits(edits);
  result.edits = edits.length;

  await store.updateDocument(documentId, { reviewed_at: timestamp });
  return result;
}
