/**
 * Google Gemini LLM Adapter
 *
 * Adapter implementation for the Google Gemini API via `@google/generative-ai`.
 * This is the default provider for paper metadata extraction.
 */

import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type Content,
  type GenerationConfig,
  type GenerativeModel,
} from '@google/generative-ai';

import { LLMAdapter, type LLMAdapterConfig } from '../adapter.js';
import { registerAdapter } from '../factory.js';
import {
  type LLMMessage,
  type LLMResponse,
  type LLMCompletionOptions,
  LLMProvider,
} from '../types.js';
import {
  LLMError,
  ContentFilteredError,
  TimeoutError,
  NetworkError,
  errorFromStatus,
} from '../errors.js';

// =============================================================================
// GeminiAdapter Implementation
// =============================================================================

/**
 * LLM adapter for Google's Gemini API.
 *
 * @example
 * ```typescript
 * const adapter = new GeminiAdapter({
 *   provider: 'gemini',
 *   model: 'gemini-2.5-flash',
 *   maxTokens: 2048,
 *   temperature: 0.1,
 *   apiKey: process.env.GEMINI_API_KEY_1 ?? '',
 * });
 *
 * const response = await adapter.complete(
 *   [
 *     { role: 'system', content: 'Extract the paper metadata as JSON.' },
 *     { role: 'user', content: firstPageText },
 *   ],
 *   { responseFormat: 'json' }
 * );
 * ```
 */
export class GeminiAdapter extends LLMAdapter {
  private readonly client: GoogleGenerativeAI;

  constructor(config: LLMAdapterConfig) {
    super(config);
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    this.validateMessages(messages);

    const mergedOptions = this.mergeOptions(options);
    const [systemMessage, conversationMessages] = this.extractSystemMessage(messages);

    const generationConfig: GenerationConfig = {
      temperature: mergedOptions.temperature,
      maxOutputTokens: mergedOptions.maxTokens,
    };
    if (mergedOptions.responseFormat === 'json') {
      generationConfig.responseMimeType = 'application/json';
    }

    const model = this.getModel(generationConfig, systemMessage);
    const contents = this.convertMessages(conversationMessages);

    return this.executeWithRetry(async () => {
      try {
        const result = await model.generateContent({ contents });
        const response = result.response;

        const blockReason = response.promptFeedback?.blockReason;
        if (blockReason) {
          throw new ContentFilteredError(
            `Prompt blocked: ${blockReason}`,
            LLMProvider.GEMINI
          );
        }

        return {
          content: response.text(),
          model: this.config.model,
          usage: {
            inputTokens: response.usageMetadata?.promptTokenCount ?? 0,
            outputTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
          },
        };
      } catch (error) {
        throw this.handleError(error);
      }
    });
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private getModel(
    generationConfig: GenerationConfig,
    systemInstruction: string | undefined
  ): GenerativeModel {
    return this.client.getGenerativeModel(
      {
        model: this.config.model,
        generationConfig,
        ...(systemInstruction !== undefined && { systemInstruction }),
      },
      this.config.timeoutMs !== undefined ? { timeout: this.config.timeoutMs } : undefined
    );
  }

  /**
   * Gemini names the assistant role `model`.
   */
  private convertMessages(messages: LLMMessage[]): Content[] {
    return messages.map((msg) => ({
      role: msg.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: msg.content }],
    }));
  }

  /**
   * Maps SDK errors to specific LLMError types.
   *
   * Gemini reports an invalid key as a 400 whose message names the key, so
   * that case is checked before the generic invalid-request mapping.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof GoogleGenerativeAIFetchError) {
      // An invalid key is reported as 400 API_KEY_INVALID
      const status =
        error.status === 400 && /api key/i.test(error.message) ? 401 : error.status;
      const mapped = errorFromStatus(status, error.message, LLMProvider.GEMINI, error);
      if (mapped) {
        return mapped;
      }
    }

    // Raised by response.text() when the candidate was blocked
    if (error instanceof GoogleGenerativeAIResponseError) {
      return new ContentFilteredError(
        `Response blocked: ${error.message}`,
        LLMProvider.GEMINI,
        error
      );
    }

    if (error instanceof Error) {
      if (error.name === 'AbortError' || /aborted|timed? ?out/i.test(error.message)) {
        return new TimeoutError(
          `Request timeout: ${error.message}`,
          LLMProvider.GEMINI,
          undefined,
          error
        );
      }

      if (/fetch failed|ECONNRESET|ENOTFOUND|ECONNREFUSED/i.test(error.message)) {
        return new NetworkError(
          `Connection error: ${error.message}`,
          LLMProvider.GEMINI,
          undefined,
          error
        );
      }
    }

    return LLMError.fromError(error, LLMProvider.GEMINI);
  }
}

// =============================================================================
// Register the Gemini Adapter
// =============================================================================

registerAdapter(LLMProvider.GEMINI, GeminiAdapter);

export default GeminiAdapter;
