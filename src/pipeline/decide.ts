import type { DocumentRow } from '../db/types';
import { appliesTo } from './forceDirective';
import { desyncStatus } from './status';
import type { Decision, ForceDirective, GovernedStage, StageName, StageStatus } from './types';

const PAYLOAD_LABEL: Record<GovernedStage, string> = {
  ocr: 'OCR text',
  metadata: 'bibliographic metadata (title, first author, year)',
  extraction: 'records',
};

/**
 * Pure run/skip choice for one stage of one document.
 *
 * `dataExists` is undefined for stages without a payload check (extraction:
 * zero records is a legitimate result).
 */
export function decide(
  stage: GovernedStage,
  status: StageStatus,
  dataExists: boolean | undefined,
  force: ForceDirective,
  documentId: number,
  upstreamRan: boolean
): Decision {
  if (appliesTo(force, documentId)) return { action: 'run', reason: 'forced' };
  if (upstreamRan) return { action: 'run', reason: 'cascade' };
  if (status.kind !== 'completed') return { action: 'run', reason: 'not_completed' };
  if (dataExists === false) {
    return {
      action: 'run',
      reason: 'desync',
      status: desyncStatus(`${stage} marked completed but ${PAYLOAD_LABEL[stage]} missing`),
    };
  }
  return { action: 'skip' };
}

function hasText(value: string | null | undefined): boolean {
  return value !== null && value !== undefined && value.trim() !== '';
}

/** Payload check per governed stage; undefined means "not checked". */
export function stageDataExists(stage: GovernedStage, document: DocumentRow): boolean | undefined {
  switch (stage) {
    case 'ocr':
      return hasText(document.document_content);
    case 'metadata':
      return (
        hasText(document.title) ||
        hasText(document.first_author_lastname) ||
        document.publication_year !== null
      );
    case 'extraction':
      return undefined;
  }
}

const DOWNSTREAM: Record<StageName, readonly StageName[]> = {
  ocr: ['metadata', 'extraction'],
  metadata: ['extraction'],
  extraction: [],
  refinement: [],
};

/** Stages whose persisted status is cleared when `stage` runs. */
export function downstreamOf(stage: StageName): readonly StageName[] {
  return DOWNSTREAM[stage];
}
