/**
 * Anthropic LLM Adapter
 *
 * Adapter implementation for the Anthropic Claude API, the alternative
 * provider for metadata extraction.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  MessageParam,
  ContentBlock,
  TextBlock,
  MessageCreateParamsNonStreaming,
} from '@anthropic-ai/sdk/resources/messages';

import { LLMAdapter, type LLMAdapterConfig } from '../adapter.js';
import { registerAdapter } from '../factory.js';
import {
  type LLMMessage,
  type LLMResponse,
  type LLMCompletionOptions,
  LLMProvider,
} from '../types.js';
import { LLMError, TimeoutError, NetworkError, errorFromStatus } from '../errors.js';

/**
 * Instruction appended to the system prompt when JSON output is requested;
 * the Messages API has no response MIME type setting.
 */
const JSON_ONLY_INSTRUCTION =
  'Respond with a single JSON object and nothing else.';

// =============================================================================
// AnthropicAdapter Implementation
// =============================================================================

/**
 * LLM adapter for Anthropic's Claude API.
 *
 * @example
 * ```typescript
 * const adapter = new AnthropicAdapter({
 *   provider: 'anthropic',
 *   model: 'claude-3-5-haiku-20241022',
 *   maxTokens: 2048,
 *   temperature: 0.1,
 *   apiKey: process.env.ANTHROPIC_API_KEY ?? '',
 *   retry: { maxRetries: 2, initialDelayMs: 2000 },
 * });
 * ```
 */
export class AnthropicAdapter extends LLMAdapter {
  private readonly client: Anthropic;

  constructor(config: LLMAdapterConfig) {
    super(config);

    // Retries are owned by executeWithRetry
    this.client = new Anthropic({
      apiKey: config.apiKey,
      maxRetries: 0,
      ...(config.timeoutMs !== undefined && { timeout: config.timeoutMs }),
    });
  }

  async complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse> {
    this.validateMessages(messages);

    const mergedOptions = this.mergeOptions(options);
    const [systemMessage, conversationMessages] = this.extractSystemMessage(messages);

    const params: MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: mergedOptions.maxTokens,
      temperature: mergedOptions.temperature,
      messages: this.convertMessages(conversationMessages),
    };

    const system =
      mergedOptions.responseFormat === 'json'
        ? [systemMessage, JSON_ONLY_INSTRUCTION].filter(Boolean).join('\n\n')
        : systemMessage;
    if (system !== undefined) {
      params.system = system;
    }

    return this.executeWithRetry(async () => {
      try {
        const response = await this.client.messages.create(params);

        return {
          content: this.extractTextContent(response.content),
          model: response.model,
          usage: {
            inputTokens: response.usage.input_tokens,
            outputTokens: response.usage.output_tokens,
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

  private convertMessages(messages: LLMMessage[]): MessageParam[] {
    return messages.map((msg): MessageParam => ({
      role: msg.role === 'assistant' ? 'assistant' : 'user',
      content: msg.content,
    }));
  }

  private extractTextContent(content: ContentBlock[]): string {
    return content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Maps Anthropic SDK errors to specific LLMError types.
   *
   * The connection error classes extend APIError with no status, so they
   * are checked first.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new TimeoutError(
        `Request timeout: ${error.message}`,
        LLMProvider.ANTHROPIC,
        undefined,
        error
      );
    }

    if (error instanceof Anthropic.APIConnectionError) {
      return new NetworkError(
        `Connection error: ${error.message}`,
        LLMProvider.ANTHROPIC,
        undefined,
        error
      );
    }

    if (error instanceof Anthropic.APIError) {
      const mapped = errorFromStatus(error.status, error.message, LLMProvider.ANTHROPIC, error);
      if (mapped) {
        return mapped;
      }
    }

    return LLMError.fromError(error, LLMProvider.ANTHROPIC);
  }
}

// =============================================================================
// Register the Anthropic Adapter
// =============================================================================

registerAdapter(LLMProvider.ANTHROPIC, AnthropicAdapter);

export default AnthropicAdapter;
