import { runAgent } from '../../agents/runAgent';
import { EXTRACTION_PROMPT } from '../../agents/prompts';
import type { DocumentPatch, DocumentRow, NewRecord, RecordRow } from '../../db/types';
import { deduplicate } from '../../dedup/deduplicate';
import {
  buildRecordsResponseSchema,
  normalizeRecord,
  type RecordSchema,
  type RecordValues,
} from '../../schema/recordSchema';
import { sha256 } from '../../utils/cache';
import type { PipelineContext } from '../context';
import { formatRecordId, highestSequence, recordIdPrefix } from '../recordIds';

export interface ExtractionStageResult {
  patch: DocumentPatch;
  inserted: number;
  duplicates: number;
}

export function promptHash(prompt: string, schema: RecordSchema): string {
  return sha256(`${prompt}\n${schema.version}`).slice(0, 16);
}

export function recordsResponseJsonSchema(schema: RecordSchema): object {
  return {
    type: 'object',
    properties: { records: schema.recordsJsonSchema },
    required: ['records'],
  };
}

function keyFields(record: RecordRow, schema: RecordSchema): RecordValues {
  const out: RecordValues = { record_id: record.record_id };
  for (const field of schema.uniqueFields) {
    out[field] = record.fields[field] ?? null;
  }
  return out;
}

function buildUserMessage(content: string, existing: RecordRow[], schema: RecordSchema): string {
  const parts = [`DOCUMENT TEXT:\n${content}`];
  const listed = existing.filter((r) => !r.deleted_by_user);
  if (listed.length > 0) {
    parts.push(
      `EXISTING RECORDS (already stored, identifying fields only):\n${JSON.stringify(
        listed.map((r) => keyFields(r, schema)),
        null,
        2
      )}`
    );
  }
  return parts.join('\n\n');
}

/**
 * Insert-only: extracts records, drops those matching a stored row and
 * inserts the rest with fresh business keys. Stored rows are never touched.
 */
export async function runExtractionStage(
  ctx: PipelineContext,
  document: DocumentRow
): Promise<ExtractionStageResult> {
  const content = document.document_content;
  if (!content || content.trim() === '') {
    throw new Error('no OCR text available');
  }

  // read fresh so rows deleted outside the pipeline are re-admitted
  const existing = await ctx.store.getRecords(document.id);

  const result = await runAgent(
    'Extraction',
    EXTRACTION_PROMPT,
    buildUserMessage(content, existing, ctx.schema),
    buildRecordsResponseSchema(ctx.schema),
    {
      models: ctx.models.extraction,
      provider: ctx.llm,
      config: ctx.agentConfig,
      logger: ctx.logger,
      responseJsonSchema: recordsResponseJsonSchema(ctx.schema),
    }
  );

  const extracted = result.data.records.map((raw, i) => normalizeRecord(ctx.schema, raw, i));
  const dedup = await deduplicate(
    extracted,
    existing.map((r) => r.fields),
    ctx.schema.uniqueFields,
    ctx.dedup.strategy,
    ctx.dedup.threshold,
    ctx.logger
  );

  const prefix = recordIdPrefix(document.first_author_lastname, document.publication_year);
  const lastSequence = highestSequence(existing.map((r) => r.record_id));
  const now = new Date().toISOString();
  const hash = promptHash(EXTRACTION_PROMPT, ctx.schema);
  const newRecords: NewRecord[] = dedup.keptRecords.map((fields, i) => ({
    record_id: formatRecordId(prefix, lastSequence + i + 1),
    fields,
    llm_model: result.modelUsed,
    prompt_hash: hash,
    extracted_at: now,
  }));

  const inserted = await ctx.store.insertRecords(document.id, newRecords);
  ctx.logger.info(
    `Document ${document.id}: ${extracted.length} extracted, ${dedup.duplicateCount} duplicate(s), ${inserted.length} inserted`
  );

  const active = existing.filter((r) => !r.deleted_by_user).length + inserted.length;
  return {
    patch: {
      extraction_llm_model: result.modelUsed,
      extraction_log: result.failures.length > 0 ? JSON.stringify(result.failures) : null,
      records_extracted: active,
    },
    inserted: inserted.length,
    duplicates: dedup.duplicateCount,
  };
}
