import { runAgent } from '../agents/runAgent';
import type { AgentConfig } from '../agents/config';
import type { LlmProvider } from '../agents/llmProvider';
import { DEDUPLICATION_PROMPT } from '../agents/prompts';
import { DedupJudgementSchema } from '../agents/schemas';
import { PROMPT_VERSIONS, SCHEMA_VERSIONS } from '../agents/versions';
import type { EmbeddingsClient, EmbeddingVector } from '../embeddings/embed';
import { cosineSimilarity } from '../embeddings/similarity';
import type { RecordValues } from '../schema/recordSchema';
import { canonicalize } from '../utils/canonicalize';
import type { FileCache } from '../utils/cache';
import { errorMessage, type Logger } from '../utils/logger';
import { jaccardSimilarity } from './similarity';

export type DedupMethod = 'lexical' | 'embedding' | 'semantic';

/** Scores two populated field values in [0, 1]. */
export interface PairwiseStrategy {
  readonly kind: 'pairwise';
  readonly method: DedupMethod;
  /** Called once per deduplication with every value that will be compared. */
  prepare(values: string[]): Promise<void>;
  similarity(a: string, b: string): number;
}

/**
 * Classifies a whole batch at once. Returns the indices of new records to
 * keep, or null when the judgement is unusable and everything is kept.
 */
export interface BatchStrategy {
  readonly kind: 'batch';
  readonly method: DedupMethod;
  judge(
    newRecords: RecordValues[],
    existingRecords: RecordValues[],
    uniqueFields: string[]
  ): Promise<number[] | null>;
}

export type DedupStrategy = PairwiseStrategy | BatchStrategy;

export class LexicalSimilarity implements PairwiseStrategy {
  readonly kind = 'pairwise';
  readonly method = 'lexical';

  constructor(private readonly n = 3) {}

  async prepare(): Promise<void> {}

  similarity(a: string, b: string): number {
    return jaccardSimilarity(a, b, this.n);
  }
}

export class EmbeddingSimilarity implements PairwiseStrategy {
  readonly kind = 'pairwise';
  readonly method = 'embedding';
  private vectors = new Map<string, EmbeddingVector>();

  constructor(private readonly client: EmbeddingsClient) {}

  async prepare(values: string[]): Promise<void> {
    const missing = Array.from(new Set(values.map((v) => canonicalize(v)))).filter(
      (v) => v !== '' && !this.vectors.has(v)
    );
    if (missing.length === 0) return;
    const embedded = await this.client.embedTexts(missing);
    missing.forEach((text, i) => {
      const vector = embedded[i];
      if (vector) this.vectors.set(text, vector);
    });
  }

  similarity(a: string, b: string): number {
    const ca = canonicalize(a);
    const cb = canonicalize(b);
    if (ca === cb) return 1;
    const va = this.vectors.get(ca);
    const vb = this.vectors.get(cb);
    if (!va || !vb) {
      throw new Error('Embedding similarity used on a value that was not prepared');
    }
    return cosineSimilarity(va, vb);
  }
}

export interface SemanticJudgeOptions {
  provider: LlmProvider;
  models: readonly string[];
  config?: AgentConfig;
  cache?: FileCache;
  logger: Logger;
}

export class SemanticJudge implements BatchStrategy {
  readonly kind = 'batch';
  readonly method = 'semantic';

  constructor(private readonly options: SemanticJudgeOptions) {}

  async judge(
    newRecords: RecordValues[],
    existingRecords: RecordValues[],
    uniqueFields: string[]
  ): Promise<number[] | null> {
    const pick = (record: RecordValues, index: number) => {
      const keyed: RecordValues = { index };
      for (const field of uniqueFields) {
        keyed[field] = record[field] ?? null;
      }
      return keyed;
    };
    const payload = {
      existing_records: existingRecords.map(pick),
      new_records: newRecords.map(pick),
    };

    try {
      const result = await runAgent(
        'Deduplication',
        DEDUPLICATION_PROMPT,
        JSON.stringify(payload, null, 2),
        DedupJudgementSchema,
        {
          models: this.options.models,
          provider: this.options.provider,
          config: this.options.config,
          logger: this.options.logger,
          cache: this.options.cache,
          cacheInput: payload,
          promptVersion: PROMPT_VERSIONS.dedup,
          schemaVersion: SCHEMA_VERSIONS.dedup,
        }
      );

      const { unique_indices: indices, all_duplicates: allDuplicates } = result.data;
      if (allDuplicates === true && (indices ?? []).length === 0) {
        return [];
      }
      if (!indices || indices.length === 0) {
        this.options.logger.warn('Semantic deduplication returned no indices; keeping all new records');
        return null;
      }
      const valid = Array.from(new Set(indices.filter((i) => i >= 0 && i < newRecords.length)));
      if (valid.length === 0) {
        this.options.logger.warn('Semantic deduplication returned only out-of-range indices; keeping all new records', {
          indices,
        });
        return null;
      }
      return valid.sort((a, b) => a - b);
    } catch (error) {
      this.options.logger.warn('Semantic deduplication failed; keeping all new records', {
        error: errorMessage(error),
      });
      return null;
    }
  }
}
