/**
 * PDF Processing Types
 *
 * Types for first-page text extraction from paper PDFs.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const PdfErrorCode = {
  /** File not found or path invalid */
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  /** Invalid or corrupted PDF */
  INVALID_PDF: 'INVALID_PDF',
  PASSWORD_PROTECTED: 'PASSWORD_PROTECTED',
  /** First page has no extractable text (scanned image or blank) */
  EMPTY_CONTENT: 'EMPTY_CONTENT',
  /** Read error (permissions, etc.) */
  READ_ERROR: 'READ_ERROR',
  EXTRACTION_ERROR: 'EXTRACTION_ERROR',
} as const;

export type PdfErrorCode = (typeof PdfErrorCode)[keyof typeof PdfErrorCode];

// =============================================================================
// Extraction Results
// =============================================================================

export interface PdfExtractionSuccess {
  success: true;
  /** Text of the first page */
  text: string;
  /** Page count of the whole document */
  pageCount: number;
  filePath: string;
  durationMs: number;
}

export interface PdfExtractionFailure {
  success: false;
  errorCode: PdfErrorCode;
  error: string;
  filePath: string;
  durationMs: number;
}

export type PdfExtractionResult = PdfExtractionSuccess | PdfExtractionFailure;

/**
 * The PDF collaborator used by the extraction gateway
 */
export interface PdfTextExtractor {
  extractFirstPageText(filePath: string): Promise<PdfExtractionResult>;
}

/**
 * Subset of the pdf-parse call used here, replaceable in tests
 */
export type PdfParser = (
  data: Buffer,
  options: { max: number }
) => Promise<{ text: string; numpages: number }>;

// =============================================================================
// Error Classes
// =============================================================================

export class PdfExtractionError extends Error {
  readonly code: PdfErrorCode;
  readonly filePath: string | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: PdfErrorCode,
    options?: { filePath?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'PdfExtractionError';
    this.code = code;
    this.filePath = options?.filePath;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PdfExtractionError);
    }
  }
}

export function isPdfExtractionError(error: unknown): error is PdfExtractionError {
  return error instanceof PdfExtractionError;
}

// =============================================================================
// Result Factory Functions
// =============================================================================

export function createSuccessResult(
  text: string,
  pageCount: number,
  filePath: string,
  durationMs: number
): PdfExtractionSuccess {
  return { success: true, text, pageCount, filePath, durationMs };
}

export function createFailureResult(
  error: string,
  errorCode: PdfErrorCode,
  filePath: string,
  durationMs: number
): PdfExtractionFailure {
  return { success: false, error, errorCode, filePath, durationMs };
}
