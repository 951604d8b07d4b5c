import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

export const DEFAULT_CACHE_ROOT = path.resolve('.cache/agent_cache');

export interface CacheKeyParts {
  agentName: string;
  model: string;
  provider: string;
  promptVersion: string;
  schemaVersion: string;
  input: unknown;
}

const CacheMetaSchema = z.object({
  createdAt: z.string(),
  durationMs: z.number(),
  agentName: z.string(),
  promptVersion: z.string(),
  schemaVersion: z.string(),
  provider: z.string(),
  model: z.string(),
  inputHash: z.string(),
  outputHash: z.string(),
  finishReason: z.string().optional(),
});

export type CacheMeta = z.infer<typeof CacheMetaSchema>;

export interface CacheEntry<T> {
  meta: CacheMeta;
  value: T;
}

const StoredEntrySchema = z.object({
  meta: CacheMetaSchema,
  value: z.unknown(),
});

export function stableStringify(value: unknown): string {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return 'null';
  }

  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    const mapped = value.map((item) => stableStringify(item));
    return `[${mapped.join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined && typeof v !== 'function' && typeof v !== 'symbol')
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const mapped = entries.map(
    ([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`
  );
  return `{${mapped.join(',')}}`;
}

export function sha256(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}

export function buildCacheKey(parts: CacheKeyParts): {
  key: string;
  inputHash: string;
} {
  const inputHash = sha256(stableStringify(parts.input));
  const raw = [
    parts.provider,
    parts.model,
    parts.agentName,
    parts.promptVersion,
    parts.schemaVersion,
    inputHash,
  ].join('|');
  return {
    key: sha256(raw),
    inputHash,
  };
}

export function buildCacheEntry<T>(
  meta: Omit<CacheMeta, 'outputHash' | 'createdAt'>,
  value: T
): CacheEntry<T> {
  return {
    meta: {
      ...meta,
      outputHash: sha256(stableStringify(value)),
      createdAt: new Date().toISOString(),
    },
    value,
  };
}

/**
 * File-per-key JSON cache for agent and embedding results. Reads hand back
 * the value unvalidated; callers parse it with the schema they expect.
 */
export class FileCache {
  constructor(
    private readonly root: string = DEFAULT_CACHE_ROOT,
    readonly enabled: boolean = true
  ) {}

  async read(cacheKey: string): Promise<CacheEntry<unknown> | null> {
    if (!this.enabled) return null;
    const filePath = path.join(this.root, `${cacheKey}.json`);
    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed = StoredEntrySchema.safeParse(safeJsonParse(data));
    if (!parsed.success) return null;
    return { meta: parsed.data.meta, value: parsed.data.value };
  }

  async write<T>(cacheKey: string, entry: CacheEntry<T>): Promise<void> {
    if (!this.enabled) return;
    await fs.mkdir(this.root, { recursive: true });
    const filePath = path.join(this.root, `${cacheKey}.json`);
    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(entry), { encoding: 'utf8' });
    await fs.rename(tmpPath, filePath);
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
