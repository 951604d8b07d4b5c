import { errorMessage } from './logger';

export interface RetryOptions {
  tries?: number;
  baseMs?: number;
  maxMs?: number;
  isRetryable?: (error: unknown) => boolean;
}

export function isTransientError(error: unknown): boolean {
  const msg = errorMessage(error);
  const lower = msg.toLowerCase();
  const is429 =
    msg.includes(' 429 ') ||
    msg.includes('"code": "429"') ||
    lower.includes('too many requests');
  const is5xx =
    msg.includes(' 500 ') ||
    msg.includes(' 502 ') ||
    msg.includes(' 503 ') ||
    msg.includes(' 504 ');
  // Postgres write contention: serialization_failure, deadlock_detected, lock_not_available
  const isContention =
    msg.includes('40001') ||
    msg.includes('40P01') ||
    msg.includes('55P03') ||
    lower.includes('could not serialize access') ||
    lower.includes('deadlock detected') ||
    lower.includes('lock timeout');
  return is429 || is5xx || isContention;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts?: RetryOptions
): Promise<T> {
  const tries = opts?.tries ?? 6;
  const baseMs = opts?.baseMs ?? 500;
  const maxMs = opts?.maxMs ?? 8000;
  const isRetryable = opts?.isRetryable ?? isTransientError;
  let lastErr: unknown;

  for (let i = 0; i < tries; i++) {
    try {
      return await fn();
    } catch (e) {
      lastErr = e;
      if (!isRetryable(e) || i === tries - 1) {
        throw e;
      }
      const jitter = Math.floor(Math.random() * 250);
      const delay = Math.min(maxMs, baseMs * Math.pow(2, i)) + jitter;
      await new Promise((r) => setTimeout(r, delay));
    }
  }
  throw lastErr;
}
