import { z } from 'zod';
import type { RecordValues } from '../schema/recordSchema';

const nullableText = z.string().nullable();

export const DocumentRowSchema = z.object({
  id: z.number().int(),
  file_name: z.string(),
  file_path: nullableText,
  file_hash: z.string(),
  file_size: z.number().nullable(),
  uploaded_at: z.string(),

  document_content: nullableText,
  ocr_images: nullableText,
  ocr_provider: nullableText,
  ocr_log: nullableText,

  title: nullableText,
  first_author_lastname: nullableText,
  authors: nullableText,
  publication_year: z.number().int().nullable(),
  doi: nullableText,
  journal: nullableText,
  volume: nullableText,
  issue: nullableText,
  pages: nullableText,
  issn: nullableText,
  publisher: nullableText,
  bibliography: nullableText,
  language: nullableText,
  metadata_llm_model: nullableText,
  metadata_log: nullableText,

  extraction_llm_model: nullableText,
  extraction_log: nullableText,
  records_extracted: z.number().int().nullable(),
  refinement_llm_model: nullableText,
  refinement_log: nullableText,

  ocr_status: nullableText,
  metadata_status: nullableText,
  extraction_status: nullableText,
  refinement_status: nullableText,

  reviewed_at: nullableText,
});

export type DocumentRow = z.infer<typeof DocumentRowSchema>;

export type NewDocument = Pick<DocumentRow, 'file_name' | 'file_path' | 'file_hash' | 'file_size'>;

export type DocumentPatch = Partial<Omit<DocumentRow, 'id' | 'file_hash' | 'uploaded_at'>>;

export const RecordSystemColumnsSchema = z
  .object({
    id: z.number().int(),
    document_id: z.number().int(),
    record_id: z.string(),
    added_by_user: z.boolean().nullable(),
    deleted_by_user: z.boolean().nullable(),
    human_edited: z.boolean().nullable(),
    llm_model: nullableText,
    prompt_hash: nullableText,
    extracted_at: nullableText,
  })
  .passthrough();

/**
 * A stored record. `id` is the immutable join key; `record_id` is the
 * reviewer-editable business key.
 */
export interface RecordRow {
  id: number;
  document_id: number;
  record_id: string;
  fields: RecordValues;
  added_by_user: boolean;
  deleted_by_user: boolean;
  human_edited: boolean;
  llm_model: string | null;
  prompt_hash: string | null;
  extracted_at: string | null;
}

export interface NewRecord {
  record_id: string;
  fields: RecordValues;
  added_by_user?: boolean;
  llm_model: string | null;
  prompt_hash: string | null;
  extracted_at: string | null;
}

export interface RecordPatch {
  record_id?: string;
  fields?: RecordValues;
  human_edited?: boolean;
  deleted_by_user?: boolean;
}

export const RecordEditRowSchema = z.object({
  id: z.number().int(),
  document_id: z.number().int(),
  /** surrogate `records.id` */
  record_id: z.number().int(),
  column_name: z.string(),
  original_value: nullableText,
  new_value: nullableText,
  edited_at: z.string(),
});

export type RecordEditRow = z.infer<typeof RecordEditRowSchema>;

export type NewRecordEdit = Omit<RecordEditRow, 'id'>;

export interface StoreStats {
  documents: number;
  records: number;
  reviewedDocuments: number;
}

/**
 * Persistence surface used by the pipeline, review and accuracy code. Every
 * write touches a single document's rows.
 */
export interface PipelineStore {
  findDocumentByHash(fileHash: string): Promise<DocumentRow | null>;
  /** Returns the existing row when another worker registered the hash first. */
  createDocument(input: NewDocument): Promise<DocumentRow>;
  getDocument(documentId: number): Promise<DocumentRow | null>;
  listDocuments(options?: { reviewedOnly?: boolean }): Promise<DocumentRow[]>;
  updateDocument(documentId: number, patch: DocumentPatch): Promise<void>;

  /** All rows of a document, soft-deleted and human-edited ones included. */
  getRecords(documentId: number): Promise<RecordRow[]>;
  listRecords(documentIds: number[]): Promise<RecordRow[]>;
  insertRecords(documentId: number, records: NewRecord[]): Promise<RecordRow[]>;
  /**
   * Updates the fields of the row with this business key, only when it is
   * neither human-edited nor deleted. Resolves false when nothing matched.
   */
  applyRefinement(
    documentId: number,
    recordId: string,
    fields: RecordValues,
    llmModel: string
  ): Promise<boolean>;
  updateRecord(id: number, patch: RecordPatch): Promise<void>;

  appendRecordEdits(edits: NewRecordEdit[]): Promise<void>;
  listRecordEdits(documentIds: number[]): Promise<RecordEditRow[]>;

  getStats(): Promise<StoreStats>;
}
