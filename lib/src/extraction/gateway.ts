/**
 * Extraction Gateway
 *
 * Runs one paper through first-page text extraction and LLM analysis and
 * returns a uniform result. Owns the per-file retry policy:
 *
 * - parse failures are retried with the same credential
 * - rate-limit and authentication errors rotate the credential, at most one
 *   attempt per credential in the pool
 * - other API errors are per-file failures (the adapter has already retried
 *   transient ones)
 */

import { type CredentialPool, type Credential, isNoCredentialsAvailableError } from '../credentials/index.js';
import {
  type AdapterProvider,
  type LLMAdapter,
  type LLMMessage,
  credentialFaultOf,
  isLLMError,
} from '../llm/index.js';
import { type PdfTextExtractor, PdfErrorCode } from '../pdf/index.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import { buildExtractionMessages } from './prompt.js';
import { parseExtractionResponse } from './parse.js';
import {
  type ExtractionFailed,
  type FailureCause,
  type FailureStage,
  type GatewayResult,
  type PaperFile,
  type PromptConfig,
  FailureCause as Cause,
  FailureStage as Stage,
} from './types.js';

export const DEFAULT_MAX_PARSE_ATTEMPTS = 2;

export interface ExtractionGatewayOptions {
  pdf: PdfTextExtractor;
  pool: CredentialPool;
  /** Builds an adapter bound to one API key */
  createAdapter: AdapterProvider;
  prompt: PromptConfig;
  /** Analysis attempts per file when the response cannot be parsed */
  maxParseAttempts?: number | undefined;
  logger?: Logger | undefined;
}

function fail(stage: FailureStage, cause: FailureCause, message: string): GatewayResult {
  const failure: ExtractionFailed = { stage, cause, message };
  return { ok: false, failure };
}

export class ExtractionGateway {
  private readonly pdf: PdfTextExtractor;
  private readonly pool: CredentialPool;
  private readonly createAdapter: AdapterProvider;
  private readonly prompt: PromptConfig;
  private readonly maxParseAttempts: number;
  private readonly logger: Logger;
  private readonly adapters = new Map<number, LLMAdapter>();

  constructor(options: ExtractionGatewayOptions) {
    this.pdf = options.pdf;
    this.pool = options.pool;
    this.createAdapter = options.createAdapter;
    this.prompt = options.prompt;
    this.maxParseAttempts = Math.max(1, options.maxParseAttempts ?? DEFAULT_MAX_PARSE_ATTEMPTS);
    this.logger = options.logger ?? getGlobalLogger().child('gateway');
  }

  async process(file: PaperFile): Promise<GatewayResult> {
    const extraction = await this.pdf.extractFirstPageText(file.path);

    if (!extraction.success) {
      const cause =
        extraction.errorCode === PdfErrorCode.EMPTY_CONTENT ? Cause.EMPTY_PAGE : Cause.IO_ERROR;
      this.logger.debug('Text stage failed', { file: file.key, cause, error: extraction.error });
      return fail(Stage.TEXT, cause, extraction.error);
    }

    if (extraction.text.trim().length === 0) {
      return fail(Stage.TEXT, Cause.EMPTY_PAGE, 'First page contains no text');
    }

    return this.analyze(file, buildExtractionMessages(this.prompt, extraction.text));
  }

  // ===========================================================================
  // Analysis Stage
  // ===========================================================================

  private async analyze(file: PaperFile, messages: LLMMessage[]): Promise<GatewayResult> {
    let credential: Credential;
    try {
      credential = this.pool.acquire();
    } catch (error) {
      return this.exhausted(error);
    }

    let credentialAttempts = 1;
    let parseAttempts = 0;

    for (;;) {
      let content: string;
      try {
        const response = await this.adapterFor(credential).complete(messages, {
          responseFormat: 'json',
        });
        content = response.content;
      } catch (error) {
        const reason = credentialFaultOf(error);
        if (reason === undefined) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.debug('Analysis failed', {
            file: file.key,
            code: isLLMError(error) ? error.code : 'unknown',
            error: message,
          });
          return fail(Stage.ANALYSIS, Cause.API_ERROR, message);
        }

        this.logger.warn('Credential rejected', {
          file: file.key,
          credential: credential.label,
          reason,
        });

        try {
          credential = this.pool.rotate(reason);
        } catch (rotateError) {
          return this.exhausted(rotateError);
        }

        if (credentialAttempts >= this.pool.size) {
          return fail(
            Stage.ANALYSIS,
            Cause.ALL_CREDENTIALS_EXHAUSTED,
            `Every credential failed for ${file.key} (${credentialAttempts} attempts)`
          );
        }
        credentialAttempts++;
        continue;
      }

      const parsed = parseExtractionResponse(content);
      if (parsed.ok) {
        return {
          ok: true,
          record: Object.freeze({ ...parsed.value, sourceFile: file }),
        };
      }

      parseAttempts++;
      this.logger.debug('Unparseable response', {
        file: file.key,
        attempt: parseAttempts,
        reason: parsed.reason,
      });
      if (parseAttempts >= this.maxParseAttempts) {
        return fail(Stage.ANALYSIS, Cause.SCHEMA_MISMATCH, parsed.reason);
      }
    }
  }

  private adapterFor(credential: Credential): LLMAdapter {
    let adapter = this.adapters.get(credential.index);
    if (!adapter) {
      adapter = this.createAdapter(credential.key);
      this.adapters.set(credential.index, adapter);
    }
    return adapter;
  }

  private exhausted(error: unknown): GatewayResult {
    if (!isNoCredentialsAvailableError(error)) {
      throw error;
    }
    return fail(Stage.ANALYSIS, Cause.ALL_CREDENTIALS_EXHAUSTED, error.message);
  }
}
