import type { AgentConfig } from '../agents/config';
import type { LlmProvider } from '../agents/llmProvider';
import type { PipelineStore } from '../db/types';
import type { DedupStrategy } from '../dedup/strategies';
import type { CrossrefClient } from '../ingest/crossref/client';
import type { OcrProvider } from '../ocr/ocr';
import type { RecordSchema } from '../schema/recordSchema';
import type { FileCache } from '../utils/cache';
import type { Logger } from '../utils/logger';

/** Collaborators shared by every stage of every document in one run. */
export interface PipelineContext {
  store: PipelineStore;
  schema: RecordSchema;
  llm: LlmProvider;
  models: {
    metadata: readonly string[];
    extraction: readonly string[];
    refinement: readonly string[];
  };
  agentConfig: AgentConfig;
  cache?: FileCache;
  dedup: {
    strategy: DedupStrategy;
    threshold: number;
  };
  ocr: {
    providers: readonly OcrProvider[];
    timeoutMs: number;
  };
  metadataPages: number;
  /** When set, metadata left empty by the model is looked up on CrossRef. */
  enrichment?: CrossrefClient;
  logger: Logger;
}
