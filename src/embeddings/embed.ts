import { GoogleGenerativeAI } from '@google/generative-ai';
import { z } from 'zod';
import { TimeoutError } from '../agents/errors';
import { buildCacheEntry, buildCacheKey, type FileCache } from '../utils/cache';
import { limit } from '../utils/limiter';
import { withTimeout } from '../utils/timeout';

export type EmbeddingVector = number[];

const EmbeddingVectorSchema = z.array(z.number());

const EMBED_BATCH_SIZE = Number(process.env.EMBED_BATCH_SIZE || '32');

export interface EmbeddingProvider {
  readonly name: string;
  embedBatch(texts: string[], model: string): Promise<EmbeddingVector[]>;
}

export class GeminiEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'gemini';
  private ai: GoogleGenerativeAI;

  constructor(apiKey: string) {
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY environment variable is not set');
    }
    this.ai = new GoogleGenerativeAI(apiKey);
  }

  async embedBatch(texts: string[], model: string): Promise<EmbeddingVector[]> {
    const m = this.ai.getGenerativeModel({ model });
    const resp = await m.batchEmbedContents({
      requests: texts.map((text) => ({ content: { role: 'user', parts: [{ text }] } })),
    });
    if (resp.embeddings.length !== texts.length) {
      throw new Error(
        `Embedding response size mismatch: sent ${texts.length}, received ${resp.embeddings.length}`
      );
    }
    return resp.embeddings.map((e) => e.values);
  }
}

export interface EmbeddingsClientOptions {
  model?: string;
  cache?: FileCache;
  batchSize?: number;
  /** Per-batch limit; a batch that takes longer rejects with TimeoutError. */
  timeoutMs?: number;
}

export class EmbeddingsClient {
  private readonly model: string;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingsClientOptions = {}
  ) {
    this.model = options.model ?? 'gemini-embedding-001';
    this.batchSize = options.batchSize ?? EMBED_BATCH_SIZE;
    this.timeoutMs = options.timeoutMs ?? 120000;
  }

  /**
   * Embeds every distinct text once; cached vectors are reused and the rest
   * go to the provider in batches. Output order matches `texts`.
   */
  async embedTexts(texts: string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];

    const vectors = new Map<string, EmbeddingVector>();
    const uniqueTexts = Array.from(new Set(texts));
    const keys = new Map(
      uniqueTexts.map((text) => [
        text,
        buildCacheKey({
          agentName: 'Embedding',
          model: this.model,
          provider: this.provider.name,
          promptVersion: 'v1',
          schemaVersion: 'v1',
          input: { text },
        }),
      ])
    );

    const cache = this.options.cache;
    if (cache) {
      const cached = await Promise.all(
        uniqueTexts.map(async (text) => {
          const key = keys.get(text);
          const entry = key ? await cache.read(key.key) : null;
          const parsed = entry ? EmbeddingVectorSchema.safeParse(entry.value) : null;
          return parsed?.success ? parsed.data : null;
        })
      );
      uniqueTexts.forEach((text, i) => {
        const vector = cached[i];
        if (vector) vectors.set(text, vector);
      });
    }

    const uncached = uniqueTexts.filter((text) => !vectors.has(text));

    for (let batchStart = 0; batchStart < uncached.length; batchStart += this.batchSize) {
      const batch = uncached.slice(batchStart, batchStart + this.batchSize);
      const start = Date.now();
      const batchVectors = await limit('embed', () =>
        withTimeout(
          this.provider.embedBatch(batch, this.model),
          this.timeoutMs,
          () => new TimeoutError('Embedding', this.timeoutMs)
        )
      );
      const durationMs = Date.now() - start;

      for (let i = 0; i < batch.length; i++) {
        const text = batch[i];
        const vector = batchVectors[i];
        if (text === undefined || vector === undefined) continue;
        vectors.set(text, vector);

        const key = keys.get(text);
        if (cache && key) {
          await cache.write(
            key.key,
            buildCacheEntry(
              {
                agentName: 'Embedding',
                promptVersion: 'v1',
                schemaVersion: 'v1',
                provider: this.provider.name,
                model: this.model,
                inputHash: key.inputHash,
                durationMs,
              },
              vector
            )
          );
        }
      }
    }

    return texts.map((text) => {
      const vector = vectors.get(text);
      if (!vector) {
        throw new Error(`No embedding returned for text: ${text.substring(0, 80)}`);
      }
      return vector;
    });
  }
}
