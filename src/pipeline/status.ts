import type { DesyncStatus, StageStatus } from './types';

export const COMPLETED = 'completed';
export const SKIPPED = 'skipped';
/** Result-table only; never written to a status column. */
export const CANCELLED = 'cancelled';
export const DESYNC_PREFIX = 'Desync detected:';

export function parseStageStatus(raw: string | null | undefined): StageStatus {
  if (raw === null || raw === undefined || raw === '') return { kind: 'unset' };
  if (raw === COMPLETED) return { kind: 'completed' };
  if (raw.startsWith(DESYNC_PREFIX)) return { kind: 'desync', message: raw };
  return { kind: 'failed', message: raw };
}

export function formatStageStatus(status: StageStatus): string | null {
  switch (status.kind) {
    case 'unset':
      return null;
    case 'completed':
      return COMPLETED;
    case 'failed':
    case 'desync':
      return status.message;
  }
}

export function desyncStatus(detail: string): DesyncStatus {
  return { kind: 'desync', message: `${DESYNC_PREFIX} ${detail}` };
}

/** Result-table view: anything other than these two is a failure. */
export function isSuccessfulOutcome(status: string): boolean {
  return status === COMPLETED || status === SKIPPED;
}
