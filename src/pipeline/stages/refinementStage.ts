import { runAgent } from '../../agents/runAgent';
import { REFINEMENT_PROMPT } from '../../agents/prompts';
import type { DocumentPatch, DocumentRow, RecordRow } from '../../db/types';
import {
  buildRecordsResponseSchema,
  coerceFieldValue,
  storageText,
  type RecordSchema,
  type RecordValues,
} from '../../schema/recordSchema';
import type { PipelineContext } from '../context';

export interface RefinementStageResult {
  patch: DocumentPatch;
  refined: number;
  ignored: number;
}

function refinementJsonSchema(schema: RecordSchema): object {
  return {
    type: 'object',
    properties: {
      records: {
        type: 'array',
        items: {
          type: 'object',
          properties: { record_id: { type: 'string' }, ...schema.fieldsJsonSchema },
          required: ['record_id'],
        },
      },
    },
    required: ['records'],
  };
}

/**
 * Fields of `refined` that carry a value different from what is stored.
 * Nulls never overwrite stored data.
 */
export function changedFields(schema: RecordSchema, current: RecordRow, refined: RecordValues): RecordValues {
  const changes: RecordValues = {};
  for (const field of schema.fields) {
    const raw = refined[field.name];
    if (raw === undefined || raw === null) continue;
    const value = coerceFieldValue(field.type, raw);
    if (storageText(field, value) !== storageText(field, current.fields[field.name])) {
      changes[field.name] = value;
    }
  }
  return changes;
}

/**
 * Update-only: applies refined values to existing rows matched by
 * `record_id`. Unknown keys are dropped; rows a reviewer edited or deleted
 * are left alone.
 */
export async function runRefinementStage(
  ctx: PipelineContext,
  document: DocumentRow,
  records: RecordRow[]
): Promise<RefinementStageResult> {
  const content = document.document_content;
  if (!content || content.trim() === '') {
    throw new Error('no OCR text available');
  }

  const editable = records.filter((r) => !r.deleted_by_user && !r.human_edited);
  const byRecordId = new Map(records.map((r) => [r.record_id, r]));
  const userMessage = [
    `DOCUMENT TEXT:\n${content}`,
    `RECORDS:\n${JSON.stringify(
      editable.map((r) => ({ record_id: r.record_id, ...r.fields })),
      null,
      2
    )}`,
  ].join('\n\n');

  const result = await runAgent(
    'Refinement',
    REFINEMENT_PROMPT,
    userMessage,
    buildRecordsResponseSchema(ctx.schema),
    {
      models: ctx.models.refinement,
      provider: ctx.llm,
      config: ctx.agentConfig,
      logger: ctx.logger,
      responseJsonSchema: refinementJsonSchema(ctx.schema),
    }
  );

  let refined = 0;
  let ignored = 0;
  for (const item of result.data.records) {
    const recordId = item.record_id;
    const current = typeof recordId === 'string' ? byRecordId.get(recordId) : undefined;
    if (typeof recordId !== 'string' || !current) {
      ignored++;
      ctx.logger.warn(`Document ${document.id}: refinement returned unknown record_id`, {
        record_id: recordId ?? null,
      });
      continue;
    }
    if (current.human_edited || current.deleted_by_user) {
      ignored++;
      continue;
    }

    const changes = changedFields(ctx.schema, current, item);
    if (Object.keys(changes).length === 0) continue;

    const applied = await ctx.store.applyRefinement(document.id, recordId, changes, result.modelUsed);
    if (applied) refined++;
    else ignored++;
  }

  ctx.logger.info(`Document ${document.id}: ${refined} record(s) refined, ${ignored} ignored`);
  return {
    patch: {
      refinement_llm_model: result.modelUsed,
      refinement_log: result.failures.length > 0 ? JSON.stringify(result.failures) : null,
    },
    refined,
    ignored,
  };
}
