export const STAGES = ['ocr', 'metadata', 'extraction', 'refinement'] as const;
export type StageName = (typeof STAGES)[number];

/** Stages whose run/skip choice goes through `decide`. */
export type GovernedStage = Exclude<StageName, 'refinement'>;

export const STAGE_STATUS_COLUMN = {
  ocr: 'ocr_status',
  metadata: 'metadata_status',
  extraction: 'extraction_status',
  refinement: 'refinement_status',
} as const satisfies Record<StageName, string>;

export type StageStatus =
  | { kind: 'unset' }
  | { kind: 'completed' }
  | { kind: 'failed'; message: string }
  | { kind: 'desync'; message: string };

export type DesyncStatus = Extract<StageStatus, { kind: 'desync' }>;

export type ForceDirective =
  | { kind: 'none' }
  | { kind: 'all' }
  | { kind: 'specific'; documentIds: ReadonlySet<number> };

export type RunReason = 'forced' | 'cascade' | 'not_completed' | 'desync';

export type Decision =
  | { action: 'skip' }
  | { action: 'run'; reason: Exclude<RunReason, 'desync'> }
  | { action: 'run'; reason: 'desync'; status: DesyncStatus };

/** What one stage did for one document in this pass. */
export interface StageOutcome {
  /** "completed", "skipped", or the failure/desync text. */
  status: string;
  ran: boolean;
}

/** Passed from stage to stage so cascade decisions never read ambient state. */
export type DocumentOutcome = Record<StageName, StageOutcome | undefined>;

export interface PipelineResult {
  file: string;
  documentId: number | null;
  ocr: string;
  metadata: string;
  extraction: string;
  refinement: string;
  recordsInserted: number;
  duplicatesRemoved: number;
  recordsRefined: number;
}

export interface ForceOptions {
  ocr: ForceDirective;
  metadata: ForceDirective;
  extraction: ForceDirective;
  /** Inclusion list for the opt-in refinement stage. */
  refine: ForceDirective;
}

export const NO_FORCE: ForceDirective = { kind: 'none' };
