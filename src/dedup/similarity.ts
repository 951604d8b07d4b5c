import { canonicalize } from '../utils/canonicalize';

export function characterNgrams(text: string, n: number): Set<string> {
  const chars = Array.from(text);
  const grams = new Set<string>();
  for (let i = 0; i + n <= chars.length; i++) {
    grams.add(chars.slice(i, i + n).join(''));
  }
  return grams;
}

/**
 * Jaccard similarity of the character n-gram sets of two canonicalized
 * strings. Identical strings score 1 even when shorter than `n`; otherwise a
 * string shorter than `n` has no n-grams and scores 0.
 */
export function jaccardSimilarity(
  a: string | null | undefined,
  b: string | null | undefined,
  n = 3
): number {
  if (a === null || a === undefined || b === null || b === undefined) return 0;

  const ca = canonicalize(a);
  const cb = canonicalize(b);
  if (ca === '' && cb === '') return 1;
  if (ca === '' || cb === '') return 0;
  if (ca === cb) return 1;

  const gramsA = characterNgrams(ca, n);
  const gramsB = characterNgrams(cb, n);
  if (gramsA.size === 0 || gramsB.size === 0) return 0;

  let intersection = 0;
  for (const gram of gramsA) {
    if (gramsB.has(gram)) intersection++;
  }
  const union = gramsA.size + gramsB.size - intersection;
  return union === 0 ? 0 : intersection / union;
}
