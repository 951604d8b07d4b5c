import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { AllModelsFailedError } from '../src/agents/errors';
import type { GenerateResponse, LlmProvider } from '../src/agents/llmProvider';
import { runAgent } from '../src/agents/runAgent';
import { MetadataSchema } from '../src/agents/schemas';
import { FileCache } from '../src/utils/cache';
import { silentLogger } from '../src/utils/logger';
import { ScriptedLlmProvider, TEST_AGENT_CONFIG, json } from './utils/fakes';

function callMetadata(provider: LlmProvider, models: string[], extra: { cache?: FileCache } = {}) {
  return runAgent('Metadata', 'Extract metadata.', 'PAGE TEXT', MetadataSchema, {
    models,
    provider,
    config: TEST_AGENT_CONFIG,
    logger: silentLogger,
    cache: extra.cache,
    cacheInput: extra.cache ? { text: 'PAGE TEXT' } : undefined,
  });
}

describe('Agent schemas', () => {
  it('accepts numeric volume and null fields in metadata', () => {
    const result = MetadataSchema.safeParse({ title: 'T', volume: 12, doi: null });
    expect(result.success).toBe(true);
  });
});

describe('runAgent', () => {
  it('returns validated data from the first model', async () => {
    const provider = new ScriptedLlmProvider({ m1: [json({ title: 'Bats of Kenya', publication_year: 2001 })] });
    const result = await callMetadata(provider, ['m1', 'm2']);

    expect(result.data).toEqual({ title: 'Bats of Kenya', publication_year: 2001 });
    expect(result.modelUsed).toBe('m1');
    expect(result.failures).toEqual([]);
    expect(result.fromCache).toBe(false);
    expect(provider.callsTo('m2')).toBe(0);
  });

  it('embeds the JSON schema and the user input in the prompt', async () => {
    const provider = new ScriptedLlmProvider({ m1: [json({})] });
    await callMetadata(provider, ['m1']);

    const request = provider.requests[0];
    expect(request?.prompt.startsWith('Extract metadata.\n\nRespond with JSON only, matching this JSON Schema:\n')).toBe(true);
    expect(request?.prompt.endsWith('\n\nUser input:\nPAGE TEXT')).toBe(true);
    expect(request?.json).toBe(true);
    expect(request?.temperature).toBe(0);
  });

  it('moves to the next model after a refusal without retrying', async () => {
    const provider = new ScriptedLlmProvider({
      m1: [{ text: '', blockReason: 'SAFETY' }],
      m2: [json({ title: 'Fallback' })],
    });
    const result = await callMetadata(provider, ['m1', 'm2']);

    expect(result.modelUsed).toBe('m2');
    expect(result.data.title).toBe('Fallback');
    expect(provider.callsTo('m1')).toBe(1);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.model).toBe('m1');
    expect(result.failures[0]?.error).toBe('Model m1 refused the request: prompt blocked (SAFETY)');
  });

  it('treats a safety finish reason as a refusal', async () => {
    const provider = new ScriptedLlmProvider({
      m1: [{ text: '{}', finishReason: 'RECITATION' }],
      m2: [json({})],
    });
    const result = await callMetadata(provider, ['m1', 'm2']);
    expect(result.failures[0]?.error).toBe('Model m1 refused the request: generation stopped (RECITATION)');
  });

  it('feeds validation errors back on retry', async () => {
    const provider = new ScriptedLlmProvider({
      m1: [json({ publication_year: 'two thousand' }), json({ publication_year: 2000 })],
    });
    const result = await callMetadata(provider, ['m1']);

    expect(result.data.publication_year).toBe(2000);
    expect(provider.callsTo('m1')).toBe(2);
    expect(provider.requests[1]?.prompt).toContain('Previous validation errors:');
    expect(provider.requests[1]?.prompt).toContain('- publication_year:');
  });

  it('retries unparseable output and strips code fences', async () => {
    const provider = new ScriptedLlmProvider({
      m1: [{ text: 'not json' }, { text: '```json\n{"title":"Fenced"}\n```' }],
    });
    const result = await callMetadata(provider, ['m1']);

    expect(result.data.title).toBe('Fenced');
    expect(provider.requests[1]?.prompt).toContain('Previous response could not be parsed');
  });

  it('throws AllModelsFailedError with one entry per model', async () => {
    const provider = new ScriptedLlmProvider({
      m1: [json({ publication_year: 'bad' })],
      m2: [new Error('upstream 500 error')],
    });

    const error = await callMetadata(provider, ['m1', 'm2']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AllModelsFailedError);
    if (error instanceof AllModelsFailedError) {
      expect(error.failures.map((f) => f.model)).toEqual(['m1', 'm2']);
      expect(error.failures[1]?.error).toBe('Agent Metadata execution failed: upstream 500 error');
      expect(error.message).toBe(
        'All 2 model(s) failed for Metadata; last error: Agent Metadata execution failed: upstream 500 error'
      );
    }
    expect(provider.callsTo('m1')).toBe(2);
    expect(provider.callsTo('m2')).toBe(2);
  });

  it('fails immediately without models', async () => {
    const provider = new ScriptedLlmProvider({});
    await expect(callMetadata(provider, [])).rejects.toThrow('All 0 model(s) failed for Metadata');
  });

  it('gives up on a model that times out', async () => {
    const slow: LlmProvider = {
      name: 'slow',
      generate: () =>
        new Promise<GenerateResponse>((resolve) => setTimeout(() => resolve(json({})), 100)),
    };
    const error = await runAgent('Metadata', 'p', 'u', MetadataSchema, {
      models: ['m1'],
      provider: slow,
      config: { maxRetries: 2, timeoutMs: 10, maxTokens: 100 },
      logger: silentLogger,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllModelsFailedError);
    if (error instanceof AllModelsFailedError) {
      expect(error.failures[0]?.error).toBe('Metadata timed out after 10ms');
    }
  });
});

describe('runAgent cache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'agent-cache-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('serves a repeated call from the cache', async () => {
    const cache = new FileCache(dir);
    const first = new ScriptedLlmProvider({ m1: [json({ title: 'Cached' })] });
    await callMetadata(first, ['m1'], { cache });

    const second = new ScriptedLlmProvider({ m1: [new Error('should not be called')] });
    const result = await callMetadata(second, ['m1'], { cache });

    expect(result.fromCache).toBe(true);
    expect(result.data.title).toBe('Cached');
    expect(second.callsTo('m1')).toBe(0);
  });

  it('does nothing when disabled', async () => {
    const cache = new FileCache(dir, false);
    const provider = new ScriptedLlmProvider({ m1: [json({ title: 'A' })] });
    await callMetadata(provider, ['m1'], { cache });
    await callMetadata(provider, ['m1'], { cache });

    expect(provider.callsTo('m1')).toBe(2);
    expect(await fs.readdir(dir)).toEqual([]);
  });
});
