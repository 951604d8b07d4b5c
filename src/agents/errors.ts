import { z } from 'zod';

export class TimeoutError extends Error {
  constructor(
    public readonly agent: string,
    public readonly timeoutMs: number
  ) {
    super(`${agent} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class SchemaValidationError extends Error {
  constructor(
    public readonly agent: string,
    public readonly validationErrors: z.ZodError,
    public readonly attempts: number
  ) {
    super(
      `Agent ${agent} failed schema validation after ${attempts} attempts: ${validationErrors.message}`
    );
    this.name = 'SchemaValidationError';
  }
}

export class AgentExecutionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly originalError: Error
  ) {
    super(`Agent ${agent} execution failed: ${originalError.message}`);
    this.name = 'AgentExecutionError';
    this.cause = originalError;
  }
}

/** The provider declined to answer (blocked prompt or a safety stop). */
export class RefusalError extends Error {
  constructor(
    public readonly model: string,
    public readonly reason: string
  ) {
    super(`Model ${model} refused the request: ${reason}`);
    this.name = 'RefusalError';
  }
}

export interface ModelAttemptFailure {
  model: string;
  error: string;
  at: string;
}

export class AllModelsFailedError extends Error {
  constructor(
    public readonly agent: string,
    public readonly failures: ModelAttemptFailure[]
  ) {
    const last = failures[failures.length - 1];
    super(
      `All ${failures.length} model(s) failed for ${agent}${last ? `; last error: ${last.error}` : ''}`
    );
    this.name = 'AllModelsFailedError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SchemaDefinitionError extends ConfigurationError {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(source ? `Invalid record schema (${source}): ${message}` : `Invalid record schema: ${message}`);
    this.name = 'SchemaDefinitionError';
  }
}
