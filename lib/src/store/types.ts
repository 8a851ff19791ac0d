/**
 * Progress Store Types
 *
 * The output table doubles as the record of which papers are done.
 */

import { z } from 'zod';
import {
  type ExtractedRecord,
  type ExtractionFailed,
  type FileKey,
  type PaperFile,
  makeFileKey,
} from '../extraction/index.js';

// =============================================================================
// Output Rows
// =============================================================================

export const OUTPUT_COLUMNS = [
  'subfolder',
  'filename',
  'author_surname',
  'author_initial',
  'year',
  'title',
  'abstract',
  'status',
  'failure_reason',
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

export const RowStatus = {
  SUCCEEDED: 'Succeeded',
  FAILED: 'Failed',
} as const;

export type RowStatus = (typeof RowStatus)[keyof typeof RowStatus];

export const OutputRowSchema = z.object({
  subfolder: z.string().min(1),
  filename: z.string().min(1),
  author_surname: z.string(),
  author_initial: z.string(),
  year: z.string(),
  title: z.string(),
  abstract: z.string(),
  status: z.enum(['Succeeded', 'Failed']),
  failure_reason: z.string(),
});

export type OutputRow = z.infer<typeof OutputRowSchema>;

export function rowKey(row: Pick<OutputRow, 'subfolder' | 'filename'>): FileKey {
  return makeFileKey(row.subfolder, row.filename);
}

export function recordToRow(record: ExtractedRecord): OutputRow {
  return {
    subfolder: record.sourceFile.subfolder,
    filename: record.sourceFile.filename,
    author_surname: record.authorSurname,
    author_initial: record.authorInitial,
    year: String(record.year),
    title: record.title,
    abstract: record.abstract,
    status: RowStatus.SUCCEEDED,
    failure_reason: '',
  };
}

/**
 * Failed rows carry the cause and empty metadata.
 */
export function failureToRow(file: PaperFile, failure: ExtractionFailed): OutputRow {
  return {
    subfolder: file.subfolder,
    filename: file.filename,
    author_surname: '',
    author_initial: '',
    year: '',
    title: '',
    abstract: '',
    status: RowStatus.FAILED,
    failure_reason: failure.cause,
  };
}

// =============================================================================
// Store Interface
// =============================================================================

export interface LoadOptions {
  /** Drop Failed rows so those papers are processed again */
  retryFailed?: boolean | undefined;
}

export interface ProgressStore {
  /**
   * Keys already present in the output.
   *
   * @throws {PersistenceError}
   */
  load(options?: LoadOptions): Promise<Set<FileKey>>;

  /**
   * Durably adds one row.
   *
   * @throws {PersistenceError} DUPLICATE_KEY if the key is present, IO_ERROR on write failure
   */
  append(row: OutputRow): Promise<void>;
}

// =============================================================================
// Errors
// =============================================================================

export const PersistenceErrorCode = {
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  IO_ERROR: 'IO_ERROR',
  INVALID_OUTPUT: 'INVALID_OUTPUT',
} as const;

export type PersistenceErrorCode =
  (typeof PersistenceErrorCode)[keyof typeof PersistenceErrorCode];

export class PersistenceError extends Error {
  readonly code: PersistenceErrorCode;
  readonly filePath: string | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: PersistenceErrorCode,
    options?: { filePath?: string | undefined; cause?: unknown }
  ) {
    super(message);
    this.name = 'PersistenceError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause instanceof Error ? options.cause : undefined;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PersistenceError);
    }
  }
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}
