/**
 * PDF Module
 */

export {
  PdfErrorCode,
  type PdfExtractionSuccess,
  type PdfExtractionFailure,
  type PdfExtractionResult,
  type PdfTextExtractor,
  type PdfParser,
  PdfExtractionError,
  isPdfExtractionError,
  createSuccessResult,
  createFailureResult,
} from './types.js';

export { FirstPageExtractor, type FirstPageExtractorOptions } from './extractor.js';
