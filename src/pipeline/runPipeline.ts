import * as fs from 'fs/promises';
import * as path from 'path';
import { AllModelsFailedError } from '../agents/errors';
import type { DocumentPatch, DocumentRow } from '../db/types';
import { OcrError } from '../ocr/ocr';
import { sha256 } from '../utils/cache';
import { errorMessage } from '../utils/logger';
import type { PipelineContext } from './context';
import { decide, downstreamOf, stageDataExists } from './decide';
import { appliesTo } from './forceDirective';
import { runExtractionStage } from './stages/extractionStage';
import { runMetadataStage } from './stages/metadataStage';
import { runOcrStage } from './stages/ocrStage';
import { runRefinementStage } from './stages/refinementStage';
import { CANCELLED, COMPLETED, SKIPPED, formatStageStatus, parseStageStatus } from './status';
import {
  STAGE_STATUS_COLUMN,
  type DocumentOutcome,
  type ForceOptions,
  type GovernedStage,
  type PipelineResult,
  type StageName,
} from './types';

const FAILURE_LABEL: Record<StageName, string> = {
  ocr: 'OCR failed',
  metadata: 'Metadata extraction failed',
  extraction: 'Extraction failed',
  refinement: 'Refinement failed',
};

const LOG_COLUMN = {
  ocr: 'ocr_log',
  metadata: 'metadata_log',
  extraction: 'extraction_log',
  refinement: 'refinement_log',
} as const satisfies Record<StageName, keyof DocumentPatch>;

const GOVERNED_STAGES: readonly GovernedStage[] = ['ocr', 'metadata', 'extraction'];

export interface PipelineFile {
  path: string;
  /** File bytes; read from `path` when absent. */
  content?: Buffer;
}

export interface ProcessOptions {
  force: ForceOptions;
  signal?: AbortSignal;
}

export interface RunPipelineOptions extends ProcessOptions {
  concurrency?: number;
}

export function stageFailureMessage(stage: StageName, error: unknown): string {
  return `${FAILURE_LABEL[stage]}: ${errorMessage(error)}`;
}

function statusPatch(stage: StageName, status: string | null): DocumentPatch {
  switch (stage) {
    case 'ocr':
      return { ocr_status: status };
    case 'metadata':
      return { metadata_status: status };
    case 'extraction':
      return { extraction_status: status };
    case 'refinement':
      return { refinement_status: status };
  }
}

function failurePatch(stage: StageName, error: unknown): DocumentPatch {
  const patch = statusPatch(stage, stageFailureMessage(stage, error));
  if (error instanceof AllModelsFailedError) {
    patch[LOG_COLUMN[stage]] = JSON.stringify(error.failures);
  } else if (error instanceof OcrError && error.attempts.length > 0) {
    patch[LOG_COLUMN[stage]] = JSON.stringify(error.attempts);
  }
  return patch;
}

function emptyResult(file: string): PipelineResult {
  return {
    file,
    documentId: null,
    ocr: SKIPPED,
    metadata: SKIPPED,
    extraction: SKIPPED,
    refinement: SKIPPED,
    recordsInserted: 0,
    duplicatesRemoved: 0,
    recordsRefined: 0,
  };
}

/** Stages that never got a result, and refinement if it was asked for, read as cancelled. */
function markCancelled(
  result: PipelineResult,
  outcome: DocumentOutcome,
  options: ProcessOptions,
  documentId: number
): PipelineResult {
  for (const stage of GOVERNED_STAGES) {
    if (outcome[stage] === undefined) result[stage] = CANCELLED;
  }
  if (appliesTo(options.force.refine, documentId)) {
    result.refinement = CANCELLED;
  }
  return result;
}

async function registerDocument(ctx: PipelineContext, file: PipelineFile, content: Buffer): Promise<DocumentRow> {
  const fileHash = sha256(content);
  const existing = await ctx.store.findDocumentByHash(fileHash);
  if (existing) return existing;

  return ctx.store.createDocument({
    file_name: path.basename(file.path),
    file_path: file.path,
    file_hash: fileHash,
    file_size: content.length,
  });
}

async function freshDocument(ctx: PipelineContext, documentId: number): Promise<DocumentRow> {
  const document = await ctx.store.getDocument(documentId);
  if (!document) {
    throw new Error(`Document ${documentId} disappeared during processing`);
  }
  return document;
}

/**
 * Walks one document through OCR, metadata, extraction and (when requested)
 * refinement. Stage failures end up in the document's status columns and in
 * the returned row; this function only rejects if `file` cannot be read and
 * the store is also unreachable.
 */
export async function processDocument(
  ctx: PipelineContext,
  file: PipelineFile,
  options: ProcessOptions
): Promise<PipelineResult> {
  const result = emptyResult(file.path);
  const outcome: DocumentOutcome = {
    ocr: undefined,
    metadata: undefined,
    extraction: undefined,
    refinement: undefined,
  };

  let content: Buffer;
  let documentId: number;
  try {
    content = file.content ?? (await fs.readFile(file.path));
    documentId = (await registerDocument(ctx, file, content)).id;
  } catch (error) {
    result.ocr = stageFailureMessage('ocr', error);
    ctx.logger.error(`${file.path}: could not register document`, { error: errorMessage(error) });
    return result;
  }
  result.documentId = documentId;

  try {
    for (const stage of GOVERNED_STAGES) {
      if (options.signal?.aborted) {
        ctx.logger.warn(`Document ${documentId}: cancelled before ${stage}`);
        return markCancelled(result, outcome, options, documentId);
      }

      const document = await freshDocument(ctx, documentId);
      const column = STAGE_STATUS_COLUMN[stage];
      const upstreamRan = GOVERNED_STAGES.slice(0, GOVERNED_STAGES.indexOf(stage)).some(
        (s) => outcome[s]?.ran === true
      );
      const decision = decide(
        stage,
        parseStageStatus(document[column]),
        stageDataExists(stage, document),
        options.force[stage],
        documentId,
        upstreamRan
      );

      if (decision.action === 'skip') {
        outcome[stage] = { status: SKIPPED, ran: false };
        result[stage] = SKIPPED;
        continue;
      }

      ctx.logger.info(`Document ${documentId}: running ${stage} (${decision.reason})`);
      const reset: DocumentPatch = {};
      for (const downstream of downstreamOf(stage)) {
        Object.assign(reset, statusPatch(downstream, null));
      }
      if (decision.reason === 'desync') {
        ctx.logger.warn(`Document ${documentId}: ${decision.status.message}`);
        Object.assign(reset, statusPatch(stage, formatStageStatus(decision.status)));
      }
      if (Object.keys(reset).length > 0) {
        await ctx.store.updateDocument(documentId, reset);
      }

      let patch: DocumentPatch;
      try {
        if (stage === 'ocr') {
          patch = await runOcrStage(ctx, content, path.basename(file.path));
        } else if (stage === 'metadata') {
          patch = await runMetadataStage(ctx, document);
        } else {
          const extraction = await runExtractionStage(ctx, document);
          result.recordsInserted = extraction.inserted;
          result.duplicatesRemoved = extraction.duplicates;
          patch = extraction.patch;
        }
      } catch (error) {
        const failure = failurePatch(stage, error);
        await ctx.store.updateDocument(documentId, failure);
        const message = stageFailureMessage(stage, error);
        outcome[stage] = { status: message, ran: false };
        result[stage] = message;
        ctx.logger.error(`Document ${documentId}: ${message}`);
        continue;
      }

      if (options.signal?.aborted) {
        ctx.logger.warn(`Document ${documentId}: cancelled during ${stage}; status left unchanged`);
        return markCancelled(result, outcome, options, documentId);
      }

      await ctx.store.updateDocument(documentId, { ...patch, ...statusPatch(stage, COMPLETED) });
      outcome[stage] = { status: COMPLETED, ran: true };
      result[stage] = COMPLETED;
    }

    await runRefinementIfRequested(ctx, documentId, options, result);
  } catch (error) {
    // store failures outside a stage call
    const message = errorMessage(error);
    ctx.logger.error(`Document ${documentId}: pipeline error`, { error: message });
    for (const stage of GOVERNED_STAGES) {
      if (outcome[stage] === undefined) {
        result[stage] = stageFailureMessage(stage, error);
      }
    }
    if (appliesTo(options.force.refine, documentId) && result.refinement === SKIPPED) {
      result.refinement = stageFailureMessage('refinement', error);
    }
  }

  return result;
}

async function runRefinementIfRequested(
  ctx: PipelineContext,
  documentId: number,
  options: ProcessOptions,
  result: PipelineResult
): Promise<void> {
  if (!appliesTo(options.force.refine, documentId)) {
    return;
  }
  if (options.signal?.aborted) {
    ctx.logger.warn(`Document ${documentId}: cancelled before refinement`);
    result.refinement = CANCELLED;
    return;
  }

  const document = await freshDocument(ctx, documentId);
  const records = await ctx.store.getRecords(documentId);
  if (!records.some((r) => !r.deleted_by_user)) {
    ctx.logger.info(`Document ${documentId}: no records to refine`);
    return;
  }

  try {
    const refinement = await runRefinementStage(ctx, document, records);
    await ctx.store.updateDocument(documentId, {
      ...refinement.patch,
      ...statusPatch('refinement', COMPLETED),
    });
    result.refinement = COMPLETED;
    result.recordsRefined = refinement.refined;
  } catch (error) {
    await ctx.store.updateDocument(documentId, failurePatch('refinement', error));
    result.refinement = stageFailureMessage('refinement', error);
    ctx.logger.error(`Document ${documentId}: ${result.refinement}`);
  }
}

/**
 * Processes files with at most `concurrency` documents in flight. Each
 * worker owns a document from OCR to refinement; results keep input order.
 */
export async function runPipeline(
  ctx: PipelineContext,
  files: PipelineFile[],
  options: RunPipelineOptions
): Promise<PipelineResult[]> {
  const concurrency = Math.max(1, options.concurrency ?? 2);
  const results: PipelineResult[] = new Array(files.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      const file = files[index];
      if (!file) continue;
      results[index] = await processDocument(ctx, file, options);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, () => worker()));
  return results;
}
