import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { AGENT_CONFIG, AgentConfig } from './config';
import {
  TimeoutError,
  SchemaValidationError,
  AgentExecutionError,
  RefusalError,
  AllModelsFailedError,
  type ModelAttemptFailure,
} from './errors';
import type { LlmProvider, GenerateResponse } from './llmProvider';
import { buildCacheEntry, buildCacheKey, type FileCache } from '../utils/cache';
import { limit } from '../utils/limiter';
import { withTimeout } from '../utils/timeout';
import { createConsoleLogger, errorMessage, type Logger } from '../utils/logger';

const defaultLogger = createConsoleLogger('Agent');

const REFUSAL_FINISH_REASONS = new Set([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
]);

export interface AgentCallOptions {
  models: readonly string[];
  provider: LlmProvider;
  config?: AgentConfig;
  logger?: Logger;
  cache?: FileCache;
  /** Identity of the request for caching; caching is skipped when absent. */
  cacheInput?: unknown;
  promptVersion?: string;
  schemaVersion?: string;
  /** JSON Schema shown to the model; derived from the zod schema otherwise. */
  responseJsonSchema?: object;
}

export interface AgentResult<T> {
  data: T;
  modelUsed: string;
  failures: ModelAttemptFailure[];
  fromCache: boolean;
}

function formatValidationErrors(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `- ${path}: ${issue.message}`;
  });
  return `Schema validation errors:\n${issues.join('\n')}`;
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced?.[1] ?? trimmed;
}

function refusalReason(response: GenerateResponse): string | null {
  if (response.blockReason) {
    return `prompt blocked (${response.blockReason})`;
  }
  if (response.finishReason && REFUSAL_FINISH_REASONS.has(response.finishReason)) {
    return `generation stopped (${response.finishReason})`;
  }
  return null;
}

/**
 * Runs a structured-output call over an ordered list of models. Each model
 * gets `maxRetries` extra attempts for unparseable or invalid output; a
 * refusal, timeout or exhausted retries moves on to the next model.
 */
export async function runAgent<T>(
  agentName: string,
  systemPrompt: string,
  userMessage: string,
  schema: z.ZodType<T>,
  options: AgentCallOptions
): Promise<AgentResult<T>> {
  const config = options.config ?? AGENT_CONFIG;
  const logger = options.logger ?? defaultLogger;
  const failures: ModelAttemptFailure[] = [];

  if (options.models.length === 0) {
    throw new AllModelsFailedError(agentName, []);
  }

  // zod-to-json-schema's parameter type is too deep to check against a generic ZodType<T>
  const jsonSchema = options.responseJsonSchema ?? zodToJsonSchema(schema as any, { target: 'openApi3' });
  const prompt = [
    systemPrompt,
    `Respond with JSON only, matching this JSON Schema:\n${JSON.stringify(jsonSchema)}`,
  ].join('\n\n');

  for (const modelName of options.models) {
    const cacheKey =
      options.cache && options.cacheInput !== undefined
        ? buildCacheKey({
            agentName,
            model: modelName,
            provider: options.provider.name,
            promptVersion: options.promptVersion ?? 'v1',
            schemaVersion: options.schemaVersion ?? 'v1',
            input: options.cacheInput,
          })
        : null;

    if (cacheKey && options.cache) {
      const hit = await options.cache.read(cacheKey.key);
      const parsed = hit ? schema.safeParse(hit.value) : null;
      if (parsed?.success) {
        logger.info(`[${agentName}] Cache hit (model: ${modelName})`);
        return { data: parsed.data, modelUsed: modelName, failures, fromCache: true };
      }
    }

    try {
      const startedAt = Date.now();
      const { data, finishReason } = await runModel(
        agentName,
        modelName,
        prompt,
        userMessage,
        schema,
        options.provider,
        config,
        logger
      );

      if (cacheKey && options.cache) {
        const entry = buildCacheEntry(
          {
            agentName,
            promptVersion: options.promptVersion ?? 'v1',
            schemaVersion: options.schemaVersion ?? 'v1',
            provider: options.provider.name,
            model: modelName,
            inputHash: cacheKey.inputHash,
            durationMs: Date.now() - startedAt,
            finishReason,
          },
          data
        );
        await options.cache.write(cacheKey.key, entry);
      }

      return { data, modelUsed: modelName, failures, fromCache: false };
    } catch (error) {
      const message = errorMessage(error);
      failures.push({ model: modelName, error: message, at: new Date().toISOString() });
      logger.warn(`[${agentName}] Model ${modelName} failed, trying next model`, {
        error: message,
        kind: error instanceof Error ? error.name : typeof error,
      });
    }
  }

  throw new AllModelsFailedError(agentName, failures);
}

async function runModel<T>(
  agentName: string,
  modelName: string,
  prompt: string,
  userMessage: string,
  schema: z.ZodType<T>,
  provider: LlmProvider,
  config: AgentConfig,
  logger: Logger
): Promise<{ data: T; finishReason?: string }> {
  let lastError: z.ZodError | null = null;
  let lastParseFailed = false;
  const attempts = config.maxRetries + 1;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    logger.info(
      `[${agentName}] Attempt ${attempt}/${attempts} (model: ${modelName}, maxOutputTokens: ${config.maxTokens}, timeoutMs: ${config.timeoutMs})`
    );

    let enhancedUserMessage = userMessage;
    if (lastParseFailed) {
      enhancedUserMessage = `${userMessage}\n\nPrevious response could not be parsed (likely truncation or invalid JSON). Return valid JSON only.`;
    } else if (lastError) {
      enhancedUserMessage = `${userMessage}\n\nPrevious validation errors:\n${formatValidationErrors(lastError)}\n\nPlease fix these errors and return valid JSON.`;
    }

    let response: GenerateResponse;
    try {
      response = await limit('llm', () =>
        withTimeout(
          provider.generate({
            model: modelName,
            prompt: `${prompt}\n\nUser input:\n${enhancedUserMessage}`,
            maxOutputTokens: config.maxTokens,
            temperature: 0.0,
            json: true,
          }),
          config.timeoutMs,
          () => new TimeoutError(agentName, config.timeoutMs)
        )
      );
    } catch (error) {
      if (error instanceof TimeoutError || attempt === attempts) {
        throw error instanceof TimeoutError
          ? error
          : new AgentExecutionError(agentName, error instanceof Error ? error : new Error(String(error)));
      }
      logger.warn(`[${agentName}] Error on attempt ${attempt}`, { error: errorMessage(error) });
      continue;
    }

    const refusal = refusalReason(response);
    if (refusal) {
      throw new RefusalError(modelName, refusal);
    }

    let jsonData: unknown;
    try {
      jsonData = JSON.parse(stripCodeFence(response.text));
      lastParseFailed = false;
    } catch (parseError) {
      lastParseFailed = true;
      logger.warn(`[${agentName}] JSON parse error`, {
        error: errorMessage(parseError),
        attempt,
        preview: response.text.substring(0, 500),
      });
      if (attempt === attempts) {
        throw new AgentExecutionError(
          agentName,
          new Error(`Failed to parse JSON from response: ${errorMessage(parseError)}`)
        );
      }
      continue;
    }

    const validationResult = schema.safeParse(jsonData);
    if (validationResult.success) {
      logger.info(`[${agentName}] Success on attempt ${attempt}`, {
        inputTokens: response.inputTokens,
        outputTokens: response.outputTokens,
      });
      return { data: validationResult.data, finishReason: response.finishReason };
    }

    lastError = validationResult.error;
    logger.warn(`[${agentName}] Schema validation failed`, {
      attempt,
      errors: validationResult.error.issues,
    });
    if (attempt === attempts) {
      throw new SchemaValidationError(agentName, validationResult.error, attempt);
    }
  }

  throw new Error(`Unexpected state in runAgent for ${agentName}`);
}
