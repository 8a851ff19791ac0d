/**
 * Batch Orchestration Types
 *
 * Phases, observer events, operator checkpoints and run summaries for a
 * batch run over `<inputDir>/<prefix><N>/*.pdf`.
 */

import { z } from 'zod';
import type {
  ExtractedRecord,
  ExtractionFailed,
  FailureCause,
  FailureStage,
  FileKey,
  GatewayResult,
  PaperFile,
} from '../extraction/index.js';
import type { PersistenceErrorCode, ProgressStore } from '../store/index.js';
import type { Logger } from '../logging/index.js';

// ============================================================================
// Phases
// ============================================================================

export const RunPhase = {
  IDLE: 'idle',
  SCANNING: 'scanning',
  PROCESSING: 'processing',
  AWAITING_OPERATOR: 'awaiting_operator',
  DONE: 'done',
  ABORTED: 'aborted',
  HALTED: 'halted',
} as const;

export type RunPhase = (typeof RunPhase)[keyof typeof RunPhase];

export const RunOutcome = {
  COMPLETED: 'completed',
  ABORTED: 'aborted',
  HALTED: 'halted',
} as const;

export type RunOutcome = (typeof RunOutcome)[keyof typeof RunOutcome];

// ============================================================================
// Discovery
// ============================================================================

export interface Subfolder {
  name: string;
  /** The N in `<prefix><N>` */
  ordinal: number;
  path: string;
}

export const DEFAULT_SUBFOLDER_PREFIX = 'part_';

// ============================================================================
// Operator Gate
// ============================================================================

export const OperatorDecision = {
  CONTINUE: 'continue',
  ABORT: 'abort',
} as const;

export type OperatorDecision = (typeof OperatorDecision)[keyof typeof OperatorDecision];

export interface OperatorCheckpoint {
  completed: SubfolderSummary;
  next: Subfolder;
  /** 1-based position of the completed subfolder */
  position: number;
  totalSubfolders: number;
}

/**
 * Decides whether the run moves on to the next subfolder.
 */
export interface OperatorGate {
  awaitDecision(checkpoint: OperatorCheckpoint): Promise<OperatorDecision>;
}

// ============================================================================
// Summaries
// ============================================================================

export interface SubfolderSummary {
  name: string;
  /** PDFs found in the subfolder */
  discovered: number;
  /** Already in the output before this run */
  skipped: number;
  succeeded: number;
  failed: number;
  /** Pending but not attempted (limit, dry run or halt) */
  notAttempted: number;
}

export type FatalStage = FailureStage | 'persistence';

export interface FatalCondition {
  stage: FatalStage;
  cause: FailureCause | PersistenceErrorCode;
  message: string;
  /** File being processed when the run halted, null before the first file */
  file: FileKey | null;
  /** Last file whose row was written in this run */
  lastProcessed: FileKey | null;
}

export interface RunSummary {
  outcome: RunOutcome;
  subfolders: SubfolderSummary[];
  totals: Omit<SubfolderSummary, 'name'>;
  fatal?: FatalCondition | undefined;
  /** The run stopped because the file limit was reached */
  stoppedByLimit: boolean;
  dryRun: boolean;
  durationMs: number;
}

export function createSubfolderSummary(name: string): SubfolderSummary {
  return { name, discovered: 0, skipped: 0, succeeded: 0, failed: 0, notAttempted: 0 };
}

export function sumSubfolders(
  summaries: readonly SubfolderSummary[]
): Omit<SubfolderSummary, 'name'> {
  return summaries.reduce(
    (acc, s) => ({
      discovered: acc.discovered + s.discovered,
      skipped: acc.skipped + s.skipped,
      succeeded: acc.succeeded + s.succeeded,
      failed: acc.failed + s.failed,
      notAttempted: acc.notAttempted + s.notAttempted,
    }),
    { discovered: 0, skipped: 0, succeeded: 0, failed: 0, notAttempted: 0 }
  );
}

// ============================================================================
// Events
// ============================================================================

export interface RunStartInfo {
  inputDir: string;
  subfolders: Subfolder[];
  /** Keys already in the output */
  alreadyDone: number;
  dryRun: boolean;
}

export interface FilePosition {
  /** 1-based within the subfolder's pending files */
  index: number;
  total: number;
}

/**
 * Observer of orchestrator transitions. All callbacks are optional.
 */
export interface BatchRunEvents {
  onPhaseChange?: (from: RunPhase, to: RunPhase) => void;
  onRunStart?: (info: RunStartInfo) => void;
  onSubfolderStart?: (subfolder: Subfolder, pending: readonly PaperFile[], skipped: number) => void;
  onFileStart?: (file: PaperFile, position: FilePosition) => void;
  onFileSucceeded?: (file: PaperFile, record: ExtractedRecord) => void;
  onFileFailed?: (file: PaperFile, failure: ExtractionFailed) => void;
  onSubfolderComplete?: (summary: SubfolderSummary) => void;
  onAwaitingOperator?: (checkpoint: OperatorCheckpoint) => void;
  onRunHalted?: (fatal: FatalCondition) => void;
  onRunComplete?: (summary: RunSummary) => void;
}

// ============================================================================
// Orchestrator Options
// ============================================================================

/**
 * The per-file processing collaborator (the extraction gateway)
 */
export interface PaperProcessor {
  process(file: PaperFile): Promise<GatewayResult>;
}

/**
 * Credential cursor reset at the start of each subfolder
 */
export interface CursorResettable {
  resetCursor(): void;
}

export const RunOptionsSchema = z.object({
  /** Stop after this many files have been attempted */
  limit: z.number().int().positive().optional(),
  /** List pending files without processing them */
  dryRun: z.boolean().default(false),
  /** Reprocess papers whose previous row is Failed */
  retryFailed: z.boolean().default(false),
});

export type RunOptions = z.input<typeof RunOptionsSchema>;

export interface BatchOrchestratorOptions {
  inputDir: string;
  subfolderPrefix?: string | undefined;
  processor: PaperProcessor;
  store: ProgressStore;
  operator: OperatorGate;
  credentials?: CursorResettable | undefined;
  events?: BatchRunEvents | undefined;
  logger?: Logger | undefined;
  /** Aborting stops the run before the next file */
  signal?: AbortSignal | undefined;
}
