import { z } from 'zod';
import { ConfigurationError } from '../agents/errors';

const modelList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((m) => m.trim())
        .filter(Boolean)
    )
    .refine((models) => models.length > 0, 'at least one model is required');

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  GOOGLE_API_KEY: z.string().default(''),
  SUPABASE_URL: z.string().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),

  SCHEMA_FILE: z.string().default('schemas/schema.json'),

  METADATA_MODELS: modelList('gemini-2.5-flash,gemini-2.5-pro'),
  EXTRACTION_MODELS: modelList('gemini-2.5-pro,gemini-2.5-flash'),
  REFINEMENT_MODELS: modelList('gemini-2.5-pro'),
  DEDUP_MODELS: modelList('gemini-2.5-flash'),
  OCR_MODEL: z.string().default('gemini-2.5-flash'),
  EMBEDDING_MODEL: z.string().default('gemini-embedding-001'),

  DEDUP_METHOD: z.enum(['lexical', 'embedding', 'semantic']).default('lexical'),
  DEDUP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.9),
  DEDUP_NGRAM: intFromEnv(3),

  OCR_PROVIDERS: z
    .string()
    .default('pdf-text,gemini')
    .transform((value) =>
      value
        .split(',')
        .map((p) => p.trim())
        .filter(Boolean)
    )
    .pipe(z.array(z.enum(['pdf-text', 'gemini'])).min(1)),
  OCR_TIMEOUT_MS: intFromEnv(180000),
  LLM_TIMEOUT_MS: intFromEnv(120000),
  PDF_PARSE_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
  METADATA_PAGES: intFromEnv(3),
  WORKER_CONCURRENCY: intFromEnv(2),

  CROSSREF_ENRICHMENT: z
    .enum(['true', 'false', '1', '0', ''])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
  CROSSREF_MAILTO: z.string().email().optional(),
  CROSSREF_TIMEOUT_MS: intFromEnv(15000),

  DISABLE_AGENT_CACHE: z
    .enum(['true', 'false', '1', '0', ''])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
});

export interface PipelineConfig {
  googleApiKey: string;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  schemaFile: string;
  models: {
    metadata: string[];
    extraction: string[];
    refinement: string[];
    dedup: string[];
    ocr: string;
    embedding: string;
  };
  dedup: {
    method: 'lexical' | 'embedding' | 'semantic';
    threshold: number;
    ngram: number;
  };
  ocr: {
    providers: Array<'pdf-text' | 'gemini'>;
    timeoutMs: number;
    pdfConfidenceThreshold: number;
  };
  llmTimeoutMs: number;
  enrichment: {
    enabled: boolean;
    mailto?: string;
    timeoutMs: number;
  };
  metadataPages: number;
  concurrency: number;
  cacheEnabled: boolean;
}

/**
 * Reads pipeline settings from the environment. Invalid values are a
 * configuration error raised before any document is processed.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  // empty strings in .env mean "use the default"
  const defined = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(defined);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    googleApiKey: e.GOOGLE_API_KEY,
    supabaseUrl: e.SUPABASE_URL,
    supabaseServiceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
    schemaFile: e.SCHEMA_FILE,
    models: {
      metadata: e.METADATA_MODELS,
      extraction: e.EXTRACTION_MODELS,
      refinement: e.REFINEMENT_MODELS,
      dedup: e.DEDUP_MODELS,
      ocr: e.OCR_MODEL,
      embedding: e.EMBEDDING_MODEL,
    },
    dedup: {
      method: e.DEDUP_METHOD,
      threshold: e.DEDUP_THRESHOLD,
      ngram: e.DEDUP_NGRAM,
    },
    ocr: {
      providers: e.OCR_PROVIDERS,
      timeoutMs: e.OCR_TIMEOUT_MS,
      pdfConfidenceThreshold: e.PDF_PARSE_CONFIDENCE_THRESHOLD,
    },
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    enrichment: {
      enabled: e.CROSSREF_ENRICHMENT,
      mailto: e.CROSSREF_MAILTO,
      timeoutMs: e.CROSSREF_TIMEOUT_MS,
    },
    metadataPages: e.METADATA_PAGES,
    concurrency: e.WORKER_CONCURRENCY,
    cacheEnabled: !e.DISABLE_AGENT_CACHE,
  };
}
