/**
 * Extraction Types
 *
 * Papers, extracted records, and the result of running one paper through
 * text extraction and LLM analysis.
 */

import { z } from 'zod';

// =============================================================================
// Papers
// =============================================================================

/**
 * `<subfolder>/<filename>`, independent of the input root
 */
export type FileKey = string;

export function makeFileKey(subfolder: string, filename: string): FileKey {
  return `${subfolder}/${filename}`;
}

export const PaperStatus = {
  PENDING: 'pending',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
} as const;

export type PaperStatus = (typeof PaperStatus)[keyof typeof PaperStatus];

export interface PaperFile {
  /** Absolute path, the paper's identity */
  readonly path: string;
  readonly subfolder: string;
  readonly filename: string;
  readonly key: FileKey;
  /** Changed only by the orchestrator */
  status: PaperStatus;
}

// =============================================================================
// Extracted Records
// =============================================================================

export const UNKNOWN_YEAR = 'unknown';

export type PublicationYear = number | typeof UNKNOWN_YEAR;

export interface ExtractedRecord {
  readonly authorSurname: string;
  readonly authorInitial: string;
  readonly year: PublicationYear;
  readonly title: string;
  /** May be empty */
  readonly abstract: string;
  readonly sourceFile: PaperFile;
}

// =============================================================================
// LLM Response Schema
// =============================================================================

export const RESPONSE_FIELDS = [
  'author_surname',
  'author_initial',
  'year',
  'title',
  'abstract',
] as const;

export type ResponseField = (typeof RESPONSE_FIELDS)[number];

const nullableText = z.union([z.string(), z.number()]).nullable();

/**
 * Every field must be present; values may be null.
 */
export const ExtractionResponseSchema = z.object({
  author_surname: nullableText,
  author_initial: nullableText,
  year: nullableText,
  title: nullableText,
  abstract: nullableText,
});

export type ExtractionResponse = z.infer<typeof ExtractionResponseSchema>;

// =============================================================================
// Prompt Configuration
// =============================================================================

export const TEXT_PLACEHOLDER = '{{text}}';

export const PromptConfigSchema = z.object({
  system: z.string().min(1),
  /** Template for the user message, must contain `{{text}}` */
  user: z
    .string()
    .refine((value) => value.includes(TEXT_PLACEHOLDER), {
      message: `must contain ${TEXT_PLACEHOLDER}`,
    }),
  /** Page text beyond this many characters is cut off */
  maxInputChars: z.number().int().positive(),
  /** Description of each response field, rendered into the system instruction */
  fields: z.record(z.enum(RESPONSE_FIELDS), z.string()).default({}),
});

export type PromptConfig = z.infer<typeof PromptConfigSchema>;

// =============================================================================
// Gateway Results
// =============================================================================

export const FailureStage = {
  TEXT: 'text',
  ANALYSIS: 'analysis',
} as const;

export type FailureStage = (typeof FailureStage)[keyof typeof FailureStage];

export const FailureCause = {
  EMPTY_PAGE: 'EmptyPage',
  IO_ERROR: 'IoError',
  SCHEMA_MISMATCH: 'SchemaMismatch',
  API_ERROR: 'ApiError',
  ALL_CREDENTIALS_EXHAUSTED: 'AllCredentialsExhausted',
} as const;

export type FailureCause = (typeof FailureCause)[keyof typeof FailureCause];

export interface ExtractionFailed {
  stage: FailureStage;
  cause: FailureCause;
  message: string;
}

export type GatewayResult =
  | { ok: true; record: ExtractedRecord }
  | { ok: false; failure: ExtractionFailed };

/**
 * Failures that end the whole run instead of being recorded for one file
 */
export function isRunFatal(failure: ExtractionFailed): boolean {
  return failure.cause === FailureCause.ALL_CREDENTIALS_EXHAUSTED;
}
