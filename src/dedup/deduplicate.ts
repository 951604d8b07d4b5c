import { comparableText } from '../utils/canonicalize';
import { createConsoleLogger, type Logger } from '../utils/logger';
import type { RecordValues } from '../schema/recordSchema';
import type { DedupStrategy, PairwiseStrategy } from './strategies';

const defaultLogger = createConsoleLogger('Dedup');

export const DEFAULT_DEDUP_THRESHOLD = 0.9;

export interface DedupDecision {
  /** Index into `newRecords`. */
  index: number;
  kept: boolean;
  /** Index into `existingRecords` of the matching row, for pairwise strategies. */
  duplicateOf?: number;
  scores?: Record<string, number>;
}

export interface DedupResult {
  keptRecords: RecordValues[];
  duplicateCount: number;
  decisions: DedupDecision[];
}

interface PairComparison {
  compared: number;
  duplicate: boolean;
  scores: Record<string, number>;
}

function compareRecords(
  candidate: RecordValues,
  existing: RecordValues,
  uniqueFields: string[],
  strategy: PairwiseStrategy,
  threshold: number
): PairComparison {
  const scores: Record<string, number> = {};
  let compared = 0;
  for (const field of uniqueFields) {
    const a = comparableText(candidate[field]);
    const b = comparableText(existing[field]);
    if (a === null || b === null) continue;

    compared++;
    const score = strategy.similarity(a, b);
    scores[field] = score;
    if (score < threshold) {
      return { compared, duplicate: false, scores };
    }
  }
  return { compared, duplicate: compared > 0, scores };
}

/**
 * Filters `newRecords` against the rows already stored for a document.
 *
 * A pair is a duplicate when at least one unique field is populated on both
 * sides and every such field scores at or above `threshold`. Batch strategies
 * decide for the whole set in one call and keep everything when their answer
 * is unusable.
 */
export async function deduplicate(
  newRecords: RecordValues[],
  existingRecords: RecordValues[],
  uniqueFields: string[],
  strategy: DedupStrategy,
  threshold: number = DEFAULT_DEDUP_THRESHOLD,
  logger: Logger = defaultLogger
): Promise<DedupResult> {
  const keepAll = (): DedupResult => ({
    keptRecords: [...newRecords],
    duplicateCount: 0,
    decisions: newRecords.map((_, index) => ({ index, kept: true })),
  });

  if (newRecords.length === 0 || existingRecords.length === 0) {
    return keepAll();
  }

  if (strategy.kind === 'batch') {
    const keep = await strategy.judge(newRecords, existingRecords, uniqueFields);
    if (keep === null) return keepAll();

    const keepSet = new Set(keep);
    const decisions = newRecords.map((_, index) => ({ index, kept: keepSet.has(index) }));
    const keptRecords = newRecords.filter((_, index) => keepSet.has(index));
    logger.info(`Semantic check kept ${keptRecords.length}/${newRecords.length} new records`);
    return {
      keptRecords,
      duplicateCount: newRecords.length - keptRecords.length,
      decisions,
    };
  }

  const values: string[] = [];
  for (const record of [...newRecords, ...existingRecords]) {
    for (const field of uniqueFields) {
      const text = comparableText(record[field]);
      if (text !== null) values.push(text);
    }
  }
  await strategy.prepare(values);

  const decisions: DedupDecision[] = [];
  const keptRecords: RecordValues[] = [];

  newRecords.forEach((candidate, index) => {
    for (let e = 0; e < existingRecords.length; e++) {
      const existing = existingRecords[e];
      if (!existing) continue;
      const comparison = compareRecords(candidate, existing, uniqueFields, strategy, threshold);
      if (comparison.duplicate) {
        decisions.push({ index, kept: false, duplicateOf: e, scores: comparison.scores });
        return;
      }
    }
    decisions.push({ index, kept: true });
    keptRecords.push(candidate);
  });

  const duplicateCount = newRecords.length - keptRecords.length;
  if (duplicateCount > 0) {
    logger.info(
      `${strategy.method} check removed ${duplicateCount} duplicate(s) of ${newRecords.length} new records`
    );
  }
  return { keptRecords, duplicateCount, decisions };
}
