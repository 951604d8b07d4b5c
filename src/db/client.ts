import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  recordsFromStorage,
  recordsToStorage,
  type RecordSchema,
  type RecordValues,
  type StoredValue,
} from '../schema/recordSchema';
import { withRetry } from '../utils/retry';
import {
  DocumentRowSchema,
  RecordEditRowSchema,
  RecordSystemColumnsSchema,
  type DocumentPatch,
  type DocumentRow,
  type NewDocument,
  type NewRecord,
  type NewRecordEdit,
  type PipelineStore,
  type RecordEditRow,
  type RecordPatch,
  type RecordRow,
  type StoreStats,
} from './types';

const UNIQUE_VIOLATION = '23505';

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

function fail(action: string, error: PostgrestErrorLike): never {
  // code is kept in the message so withRetry can see contention codes
  throw new Error(`Failed to ${action}: ${error.message}${error.code ? ` (${error.code})` : ''}`);
}

export class DatabaseClient implements PipelineStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly schema: RecordSchema
  ) {}

  async findDocumentByHash(fileHash: string): Promise<DocumentRow | null> {
    const { data, error } = await this.client
      .from('documents')
      .select('*')
      .eq('file_hash', fileHash)
      .maybeSingle();

    if (error) fail('find document by hash', error);
    return data ? DocumentRowSchema.parse(data) : null;
  }

  async createDocument(input: NewDocument): Promise<DocumentRow> {
    const inserted = await withRetry(async () => {
      const { data, error } = await this.client.from('documents').insert(input).select().single();
      if (error?.code === UNIQUE_VIOLATION) return null;
      if (error) fail('create document', error);
      return DocumentRowSchema.parse(data);
    });
    if (inserted) return inserted;

    // another worker registered the same file first
    const existing = await this.findDocumentByHash(input.file_hash);
    if (!existing) {
      throw new Error(`Document with hash ${input.file_hash} conflicted but could not be read back`);
    }
    return existing;
  }

  async getDocument(documentId: number): Promise<DocumentRow | null> {
    const { data, error } = await this.client
      .from('documents')
      .select('*')
      .eq('id', documentId)
      .maybeSingle();

    if (error) fail('get document', error);
    return data ? DocumentRowSchema.parse(data) : null;
  }

  async listDocuments(options?: { reviewedOnly?: boolean }): Promise<DocumentRow[]> {
    let query = this.client.from('documents').select('*').order('id', { ascending: true });
    if (options?.reviewedOnly) {
      query = query.not('reviewed_at', 'is', null);
    }
    const { data, error } = await query;

    if (error) fail('list documents', error);
    return z.array(DocumentRowSchema).parse(data ?? []);
  }

  async updateDocument(documentId: number, patch: DocumentPatch): Promise<void> {
    await withRetry(async () => {
      const { error } = await this.client.from('documents').update(patch).eq('id', documentId);
      if (error) fail(`update document ${documentId}`, error);
    });
  }

  async getRecords(documentId: number): Promise<RecordRow[]> {
    const { data, error } = await this.client
      .from('records')
      .select('*')
      .eq('document_id', documentId)
      .order('id', { ascending: true });

    if (error) fail('get records', error);
    return (data ?? []).map((row) => this.toRecordRow(row));
  }

  async listRecords(documentIds: number[]): Promise<RecordRow[]> {
    if (documentIds.length === 0) return [];
    const { data, error } = await this.client
      .from('records')
      .select('*')
      .in('document_id', documentIds)
      .order('id', { ascending: true });

    if (error) fail('list records', error);
    return (data ?? []).map((row) => this.toRecordRow(row));
  }

  async insertRecords(documentId: number, records: NewRecord[]): Promise<RecordRow[]> {
    if (records.length === 0) return [];

    const rows = records.map((record) => ({
      document_id: documentId,
      record_id: record.record_id,
      added_by_user: record.added_by_user ?? false,
      deleted_by_user: false,
      human_edited: false,
      llm_model: record.llm_model,
      prompt_hash: record.prompt_hash,
      extracted_at: record.extracted_at,
      ...recordsToStorage(this.schema, record.fields),
    }));

    return withRetry(async () => {
      const { data, error } = await this.client.from('records').insert(rows).select();
      if (error) fail('insert records', error);
      return (data ?? []).map((row) => this.toRecordRow(row));
    });
  }

  async applyRefinement(
    documentId: number,
    recordId: string,
    fields: RecordValues,
    llmModel: string
  ): Promise<boolean> {
    const update = { ...this.storedSubset(fields), llm_model: llmModel };

    return withRetry(async () => {
      const { data, error } = await this.client
        .from('records')
        .update(update)
        .eq('document_id', documentId)
        .eq('record_id', recordId)
        .eq('human_edited', false)
        .eq('deleted_by_user', false)
        .select('id');

      if (error) fail(`refine record ${recordId}`, error);
      return (data ?? []).length > 0;
    });
  }

  async updateRecord(id: number, patch: RecordPatch): Promise<void> {
    const update: Record<string, StoredValue | boolean> = {
      ...(patch.fields ? this.storedSubset(patch.fields) : {}),
    };
    if (patch.record_id !== undefined) update.record_id = patch.record_id;
    if (patch.human_edited !== undefined) update.human_edited = patch.human_edited;
    if (patch.deleted_by_user !== undefined) update.deleted_by_user = patch.deleted_by_user;
    if (Object.keys(update).length === 0) return;

    await withRetry(async () => {
      const { error } = await this.client.from('records').update(update).eq('id', id);
      if (error) fail(`update record ${id}`, error);
    });
  }

  async appendRecordEdits(edits: NewRecordEdit[]): Promise<void> {
    if (edits.length === 0) return;
    await withRetry(async () => {
      const { error } = await this.client.from('record_edits').insert(edits);
      if (error) fail('append record edits', error);
    });
  }

  async listRecordEdits(documentIds: number[]): Promise<RecordEditRow[]> {
    if (documentIds.length === 0) return [];
    const { data, error } = await this.client
      .from('record_edits')
      .select('*')
      .in('document_id', documentIds)
      .order('id', { ascending: true });

    if (error) fail('list record edits', error);
    return z.array(RecordEditRowSchema).parse(data ?? []);
  }

  async getStats(): Promise<StoreStats> {
    const [documents, records, reviewed] = await Promise.all([
      this.client.from('documents').select('*', { count: 'exact', head: true }),
      this.client.from('records').select('*', { count: 'exact', head: true }),
      this.client
        .from('documents')
        .select('*', { count: 'exact', head: true })
        .not('reviewed_at', 'is', null),
    ]);

    if (documents.error) fail('count documents', documents.error);
    if (records.error) fail('count records', records.error);
    if (reviewed.error) fail('count reviewed documents', reviewed.error);

    return {
      documents: documents.count ?? 0,
      records: records.count ?? 0,
      reviewedDocuments: reviewed.count ?? 0,
    };
  }

  /** Storage form of only the schema fields present in `fields`. */
  private storedSubset(fields: RecordValues): Record<string, StoredValue> {
    const all = recordsToStorage(this.schema, fields);
    const subset: Record<string, StoredValue> = {};
    for (const name of Object.keys(fields)) {
      const value = all[name];
      if (value !== undefined) subset[name] = value;
    }
    return subset;
  }

  private toRecordRow(raw: unknown): RecordRow {
    const system = RecordSystemColumnsSchema.parse(raw);
    return {
      id: system.id,
      document_id: system.document_id,
      record_id: system.record_id,
      fields: recordsFromStorage(this.schema, system),
      added_by_user: system.added_by_user ?? false,
      deleted_by_user: system.deleted_by_user ?? false,
      human_edited: system.human_edited ?? false,
      llm_model: system.llm_model,
      prompt_hash: system.prompt_hash,
      extracted_at: system.extracted_at,
    };
  }
}

export function createDatabaseClient(
  schema: RecordSchema,
  url: string | undefined = process.env.SUPABASE_URL,
  serviceRoleKey: string | undefined = process.env.SUPABASE_SERVICE_ROLE_KEY
): DatabaseClient {
  if (!url || !serviceRoleKey) {
    throw new Error(
      'Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY environment variables'
    );
  }

  return new DatabaseClient(createClient(url, serviceRoleKey), schema);
}
