const canonicalizeCache = new Map<string, string>();

/**
 * Comparison form of a field value: Unicode NFC, lower case, trimmed.
 */
export function canonicalize(input: string): string {
  if (!input) return '';

  const cached = canonicalizeCache.get(input);
  if (cached !== undefined) {
    return cached;
  }

  const result = input.normalize('NFC').toLowerCase().trim();
  canonicalizeCache.set(input, result);
  return result;
}

/**
 * Text form of a stored value for similarity scoring. Returns null when the
 * value carries no data (null, empty string, empty array or object).
 */
export function comparableText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    return value.trim() === '' ? null : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return null;
    return JSON.stringify(value);
  }
  if (typeof value === 'object') {
    return Object.keys(value).length === 0 ? null : JSON.stringify(value);
  }
  return null;
}
