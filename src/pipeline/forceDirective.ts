import { ConfigurationError } from '../agents/errors';
import type { ForceDirective } from './types';

function parseDocumentId(value: unknown, label: string): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' && /^\s*\d+\s*$/.test(value) ? Number(value) : NaN;
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${label}: "${String(value)}" is not a document id`);
  }
  return n;
}

/**
 * Turns the loosely typed forcing option accepted at the entry point into a
 * ForceDirective. `undefined`, `null` and `false` mean no force; `true`
 * and "all" force every document; a list (or comma-separated string) of
 * positive ids forces just those. Anything else, the empty string included,
 * is rejected.
 */
export function parseForceDirective(value: unknown, label = 'force'): ForceDirective {
  if (value === undefined || value === null || value === false) return { kind: 'none' };
  if (value === true) return { kind: 'all' };

  if (typeof value === 'string') {
    const trimmed = value.trim().toLowerCase();
    if (trimmed === '') {
      throw new ConfigurationError(
        `${label}: an empty value is ambiguous; use "all", a list of ids, or omit the option`
      );
    }
    if (trimmed === 'all') return { kind: 'all' };
    return parseForceDirective(value.split(','), label);
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new ConfigurationError(`${label}: an empty id list is ambiguous; omit the option instead`);
    }
    return { kind: 'specific', documentIds: new Set(value.map((v) => parseDocumentId(v, label))) };
  }

  if (typeof value === 'number') {
    return { kind: 'specific', documentIds: new Set([parseDocumentId(value, label)]) };
  }

  throw new ConfigurationError(`${label}: unrecognized value ${JSON.stringify(value)}`);
}

export function appliesTo(directive: ForceDirective, documentId: number): boolean {
  switch (directive.kind) {
    case 'none':
      return false;
    case 'all':
      return true;
    case 'specific':
      return directive.documentIds.has(documentId);
  }
}
