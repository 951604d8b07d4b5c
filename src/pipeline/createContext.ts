import { AGENT_CONFIG } from '../agents/config';
import { GeminiProvider, type LlmProvider } from '../agents/llmProvider';
import type { PipelineConfig } from '../config/pipelineConfig';
import { createDatabaseClient } from '../db/client';
import type { PipelineStore } from '../db/types';
import { EmbeddingsClient, GeminiEmbeddingProvider } from '../embeddings/embed';
import {
  EmbeddingSimilarity,
  LexicalSimilarity,
  SemanticJudge,
  type DedupStrategy,
} from '../dedup/strategies';
import { CrossrefClient } from '../ingest/crossref/client';
import { GeminiOcrProvider, PdfTextOcrProvider, type OcrProvider } from '../ocr/ocr';
import type { RecordSchema } from '../schema/recordSchema';
import { FileCache } from '../utils/cache';
import { createConsoleLogger, type Logger } from '../utils/logger';
import type { PipelineContext } from './context';

export interface ContextOverrides {
  store?: PipelineStore;
  llm?: LlmProvider;
  logger?: Logger;
}

function buildDedupStrategy(
  config: PipelineConfig,
  llm: LlmProvider,
  cache: FileCache,
  logger: Logger
): DedupStrategy {
  switch (config.dedup.method) {
    case 'lexical':
      return new LexicalSimilarity(config.dedup.ngram);
    case 'embedding':
      return new EmbeddingSimilarity(
        new EmbeddingsClient(new GeminiEmbeddingProvider(config.googleApiKey), {
          model: config.models.embedding,
          cache,
          timeoutMs: config.llmTimeoutMs,
        })
      );
    case 'semantic':
      return new SemanticJudge({
        provider: llm,
        models: config.models.dedup,
        config: { ...AGENT_CONFIG, timeoutMs: config.llmTimeoutMs },
        cache,
        logger,
      });
  }
}

function buildOcrProviders(config: PipelineConfig, llm: LlmProvider): OcrProvider[] {
  return config.ocr.providers.map((name) =>
    name === 'pdf-text'
      ? new PdfTextOcrProvider(config.ocr.pdfConfidenceThreshold)
      : new GeminiOcrProvider(llm, config.models.ocr)
  );
}

export function createPipelineContext(
  config: PipelineConfig,
  schema: RecordSchema,
  overrides: ContextOverrides = {}
): PipelineContext {
  const logger = overrides.logger ?? createConsoleLogger('Pipeline');
  const llm = overrides.llm ?? new GeminiProvider(config.googleApiKey);
  const cache = new FileCache(undefined, config.cacheEnabled);
  const store =
    overrides.store ??
    createDatabaseClient(schema, config.supabaseUrl, config.supabaseServiceRoleKey);

  return {
    store,
    schema,
    llm,
    models: {
      metadata: config.models.metadata,
      extraction: config.models.extraction,
      refinement: config.models.refinement,
    },
    agentConfig: { ...AGENT_CONFIG, timeoutMs: config.llmTimeoutMs },
    cache,
    dedup: {
      strategy: buildDedupStrategy(config, llm, cache, logger),
      threshold: config.dedup.threshold,
    },
    ocr: {
      providers: buildOcrProviders(config, llm),
      timeoutMs: config.ocr.timeoutMs,
    },
    metadataPages: config.metadataPages,
    enrichment: config.enrichment.enabled
      ? new CrossrefClient({ mailto: config.enrichment.mailto, timeoutMs: config.enrichment.timeoutMs })
      : undefined,
    logger,
  };
}
