/**
 * PDF Text Extractor
 *
 * Extracts the text of the first page of a PDF file with pdf-parse.
 */

import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import {
  type PdfExtractionResult,
  type PdfParser,
  type PdfTextExtractor,
  PdfErrorCode,
  PdfExtractionError,
  createFailureResult,
  createSuccessResult,
} from './types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

/**
 * pdf-parse runs a self-test when loaded without a parent module, which is
 * the case for an ES module import, so it is required through createRequire.
 */
function loadPdfParse(): PdfParser {
  const require = createRequire(import.meta.url);
  const parser: PdfParser = require('pdf-parse');
  return parser;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Classifies a pdf-parse failure by its message.
 */
function classifyParseError(error: unknown): { code: PdfErrorCode; message: string } {
  const errorMessage = error instanceof Error ? error.message : String(error);

  if (/password/i.test(errorMessage)) {
    return { code: PdfErrorCode.PASSWORD_PROTECTED, message: 'PDF is password protected' };
  }

  if (/invalid|corrupt|xref|bad/i.test(errorMessage)) {
    return {
      code: PdfErrorCode.INVALID_PDF,
      message: `Invalid or corrupted PDF: ${errorMessage}`,
    };
  }

  return {
    code: PdfErrorCode.EXTRACTION_ERROR,
    message: `PDF extraction failed: ${errorMessage}`,
  };
}

export interface FirstPageExtractorOptions {
  /** Defaults to pdf-parse */
  parser?: PdfParser | undefined;
  logger?: Logger | undefined;
}

/**
 * Reads a PDF and returns the text of its first page.
 *
 * @example
 * ```typescript
 * const extractor = new FirstPageExtractor();
 * const result = await extractor.extractFirstPageText('papers/part_1/smith2020.pdf');
 * if (result.success) {
 *   console.log(result.text);
 * }
 * ```
 */
export class FirstPageExtractor implements PdfTextExtractor {
  private parser: PdfParser | undefined;
  private readonly logger: Logger;

  constructor(options: FirstPageExtractorOptions = {}) {
    this.parser = options.parser;
    this.logger = options.logger ?? getGlobalLogger().child('pdf');
  }

  async extractFirstPageText(filePath: string): Promise<PdfExtractionResult> {
    const startTime = performance.now();
    const elapsed = (): number => performance.now() - startTime;

    try {
      const buffer = await this.readPdf(filePath);
      const data = await this.getParser()(buffer, { max: 1 });

      if (data.text.trim().length === 0) {
        return createFailureResult(
          'First page contains no extractable text (may be image-based or blank)',
          PdfErrorCode.EMPTY_CONTENT,
          filePath,
          elapsed()
        );
      }

      this.logger.trace('Extracted first page', {
        filePath,
        pageCount: data.numpages,
        charCount: data.text.length,
      });
      return createSuccessResult(data.text, data.numpages, filePath, elapsed());
    } catch (error) {
      if (error instanceof PdfExtractionError) {
        return createFailureResult(error.message, error.code, filePath, elapsed());
      }

      const { code, message } = classifyParseError(error);
      return createFailureResult(message, code, filePath, elapsed());
    }
  }

  private getParser(): PdfParser {
    if (!this.parser) {
      this.parser = loadPdfParse();
    }
    return this.parser;
  }

  private async readPdf(filePath: string): Promise<Buffer> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (readError) {
      const cause = readError instanceof Error ? readError : undefined;
      if (errnoCode(readError) === 'ENOENT') {
        throw new PdfExtractionError(`PDF file not found: ${filePath}`, PdfErrorCode.FILE_NOT_FOUND, {
          filePath,
          cause,
        });
      }
      throw new PdfExtractionError(`Failed to read PDF file: ${filePath}`, PdfErrorCode.READ_ERROR, {
        filePath,
        cause,
      });
    }

    if (buffer.length === 0) {
      throw new PdfExtractionError('Invalid PDF: file is empty', PdfErrorCode.INVALID_PDF, {
        filePath,
      });
    }

    if (!buffer.subarray(0, 5).toString('ascii').startsWith('%PDF-')) {
      throw new PdfExtractionError(
        'Invalid PDF: file does not start with PDF header',
        PdfErrorCode.INVALID_PDF,
        { filePath }
      );
    }

    return buffer;
  }
}
