import { runAgent } from '../../agents/runAgent';
import { METADATA_PROMPT } from '../../agents/prompts';
import { MetadataSchema, type MetadataOutput } from '../../agents/schemas';
import { PROMPT_VERSIONS, SCHEMA_VERSIONS } from '../../agents/versions';
import type { DocumentPatch, DocumentRow } from '../../db/types';
import { limitToFirstPages } from '../../ocr/pages';
import type { PipelineContext } from '../context';
import { enrichMetadata } from './enrichment';

function text(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const s = String(value).trim();
  return s === '' ? null : s;
}

function list(value: string[] | null | undefined): string | null {
  return value && value.length > 0 ? JSON.stringify(value) : null;
}

/**
 * Metadata patch that only fills in values the model found; anything it
 * left null keeps the stored value.
 */
export function mergeMetadata(document: DocumentRow, extracted: MetadataOutput): DocumentPatch {
  return {
    title: text(extracted.title) ?? document.title,
    first_author_lastname: text(extracted.first_author_lastname) ?? document.first_author_lastname,
    authors: list(extracted.authors) ?? document.authors,
    publication_year: extracted.publication_year ?? document.publication_year,
    doi: text(extracted.doi) ?? document.doi,
    journal: text(extracted.journal) ?? document.journal,
    volume: text(extracted.volume) ?? document.volume,
    issue: text(extracted.issue) ?? document.issue,
    pages: text(extracted.pages) ?? document.pages,
    issn: text(extracted.issn) ?? document.issn,
    publisher: text(extracted.publisher) ?? document.publisher,
    bibliography: list(extracted.bibliography) ?? document.bibliography,
    language: text(extracted.language) ?? document.language,
  };
}

export async function runMetadataStage(
  ctx: PipelineContext,
  document: DocumentRow
): Promise<DocumentPatch> {
  const content = document.document_content;
  if (!content || content.trim() === '') {
    throw new Error('no OCR text available');
  }

  const firstPages = limitToFirstPages(content, ctx.metadataPages);
  const result = await runAgent('Metadata', METADATA_PROMPT, firstPages, MetadataSchema, {
    models: ctx.models.metadata,
    provider: ctx.llm,
    config: ctx.agentConfig,
    logger: ctx.logger,
    cache: ctx.cache,
    cacheInput: { text: firstPages },
    promptVersion: PROMPT_VERSIONS.metadata,
    schemaVersion: SCHEMA_VERSIONS.metadata,
  });

  const merged = mergeMetadata(document, result.data);
  const enriched = ctx.enrichment ? await enrichMetadata(ctx.enrichment, merged, ctx.logger) : {};

  return {
    ...merged,
    ...enriched,
    metadata_llm_model: result.modelUsed,
    metadata_log: result.failures.length > 0 ? JSON.stringify(result.failures) : null,
  };
}
