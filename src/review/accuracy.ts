import type { DocumentRow, RecordEditRow, RecordRow } from '../db/types';
import { isMajorField, type RecordSchema } from '../schema/recordSchema';

/** Ratios are null when their denominator is zero. */
export interface AccuracyReport {
  verified_documents: number;
  verified_records: number;
  model_extracted: number;
  human_added: number;
  deleted: number;
  records_with_edits: number;
  num_fields: number;
  column_edits: Record<string, number>;
  total_edits: number;
  major_edits: number;
  minor_edits: number;

  records_found: number;
  records_missed: number;
  records_hallucinated: number;
  detection_precision: number | null;
  detection_recall: number | null;
  perfect_record_rate: number | null;

  total_fields: number;
  correct_fields: number;
  true_fields: number;
  field_precision: number | null;
  field_recall: number | null;
  field_f1: number | null;

  column_accuracy: Record<string, number | null>;
  major_edit_rate: number | null;
  avg_edits_per_document: number | null;
}

export function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

/**
 * Extraction quality over reviewed documents, from the review audit trail.
 *
 * Detection metrics treat deleted model rows as hallucinated and rows a
 * reviewer added as missed. Field metrics give partial credit: each distinct
 * (record, column) edit on a surviving model row costs one field.
 */
export function calculateAccuracy(
  documents: DocumentRow[],
  records: RecordRow[],
  edits: RecordEditRow[],
  schema: RecordSchema
): AccuracyReport {
  const reviewedIds = new Set(documents.filter((d) => d.reviewed_at !== null).map((d) => d.id));
  const reviewedRecords = records.filter((r) => reviewedIds.has(r.document_id));

  const modelRecords = reviewedRecords.filter((r) => !r.added_by_user);
  const modelExtracted = modelRecords.length;
  const humanAdded = reviewedRecords.filter((r) => r.added_by_user && !r.deleted_by_user).length;
  const deleted = modelRecords.filter((r) => r.deleted_by_user).length;
  const surviving = new Set(modelRecords.filter((r) => !r.deleted_by_user).map((r) => r.id));

  const fieldNames = new Set(schema.fieldNames);
  const editedPairs = new Map<string, Set<number>>();
  for (const edit of edits) {
    if (!reviewedIds.has(edit.document_id)) continue;
    if (!surviving.has(edit.record_id)) continue;
    if (!fieldNames.has(edit.column_name)) continue;
    const recordsForColumn = editedPairs.get(edit.column_name) ?? new Set<number>();
    recordsForColumn.add(edit.record_id);
    editedPairs.set(edit.column_name, recordsForColumn);
  }

  const columnEdits: Record<string, number> = {};
  const editedRecords = new Set<number>();
  let totalEdits = 0;
  let majorEdits = 0;
  for (const name of schema.fieldNames) {
    const edited = editedPairs.get(name) ?? new Set<number>();
    columnEdits[name] = edited.size;
    totalEdits += edited.size;
    if (isMajorField(schema, name)) majorEdits += edited.size;
    for (const id of edited) editedRecords.add(id);
  }

  const numFields = schema.fields.length;
  const recordsFound = modelExtracted - deleted;
  const totalFields = modelExtracted * numFields;
  const correctFields = totalFields - deleted * numFields - totalEdits;
  const trueFields = (recordsFound + humanAdded) * numFields;
  const fieldPrecision = ratio(correctFields, totalFields);
  const fieldRecall = ratio(correctFields, trueFields);
  const fieldF1 =
    fieldPrecision !== null && fieldRecall !== null
      ? ratio(2 * fieldPrecision * fieldRecall, fieldPrecision + fieldRecall)
      : null;

  const columnAccuracy: Record<string, number | null> = {};
  for (const name of schema.fieldNames) {
    const editRate = ratio(columnEdits[name] ?? 0, modelExtracted);
    columnAccuracy[name] = editRate === null ? null : 1 - editRate;
  }

  return {
    verified_documents: reviewedIds.size,
    verified_records: reviewedRecords.filter((r) => !r.deleted_by_user).length,
    model_extracted: modelExtracted,
    human_added: humanAdded,
    deleted,
    records_with_edits: editedRecords.size,
    num_fields: numFields,
    column_edits: columnEdits,
    total_edits: totalEdits,
    major_edits: majorEdits,
    minor_edits: totalEdits - majorEdits,

    records_found: recordsFound,
    records_missed: humanAdded,
    records_hallucinated: deleted,
    detection_precision: ratio(recordsFound, modelExtracted),
    detection_recall: ratio(recordsFound, recordsFound + humanAdded),
    perfect_record_rate: ratio(recordsFound - editedRecords.size, recordsFound),

    total_fields: totalFields,
    correct_fields: correctFields,
    true_fields: trueFields,
    field_precision: fieldPrecision,
    field_recall: fieldRecall,
    field_f1: fieldF1,

    column_accuracy: columnAccuracy,
    major_edit_rate: ratio(majorEdits, totalEdits),
    avg_edits_per_document: ratio(totalEdits, reviewedIds.size),
  };
}
