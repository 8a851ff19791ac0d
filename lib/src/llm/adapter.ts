/**
 * LLM Adapter Base Class
 *
 * Abstract base class for LLM provider adapters. An adapter is bound to one
 * API key; the credential pool builds a new adapter when it rotates keys.
 */

import {
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
  type LLMCompletionOptions,
  type LLMProvider,
  type RetryConfig,
  type RetryEventHandler,
  DEFAULT_LLM_CONFIG,
} from './types.js';
import { InvalidRequestError } from './errors.js';
import { mergeRetryConfig, withRetry } from './retry.js';

/**
 * Adapter configuration with retry options for transient failures
 */
export interface LLMAdapterConfig extends LLMConfig {
  retry?: Partial<RetryConfig> | undefined;
  /** Receives retry events, useful for logging */
  onRetryEvent?: RetryEventHandler | undefined;
  sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

/**
 * Abstract base class for LLM adapters.
 *
 * @example
 * ```typescript
 * class EchoAdapter extends LLMAdapter {
 *   async complete(messages: LLMMessage[]): Promise<LLMResponse> {
 *     return this.executeWithRetry(async () => ({
 *       content: messages[messages.length - 1]?.content ?? '',
 *       model: this.model,
 *       usage: { inputTokens: 0, outputTokens: 0 },
 *     }));
 *   }
 * }
 * ```
 */
export abstract class LLMAdapter {
  protected readonly config: LLMConfig;

  private readonly retryConfig: Required<RetryConfig>;
  private readonly onRetryEvent: RetryEventHandler | undefined;
  private readonly sleepFn: ((ms: number) => Promise<void>) | undefined;

  constructor(config: LLMAdapterConfig) {
    this.config = {
      provider: config.provider,
      model: config.model,
      apiKey: config.apiKey,
      maxTokens: config.maxTokens ?? DEFAULT_LLM_CONFIG.maxTokens,
      temperature: config.temperature ?? DEFAULT_LLM_CONFIG.temperature,
      timeoutMs: config.timeoutMs,
    };
    this.retryConfig = mergeRetryConfig(config.retry);
    this.onRetryEvent = config.onRetryEvent;
    this.sleepFn = config.sleepFn;
  }

  // ===========================================================================
  // Abstract Methods
  // ===========================================================================

  /**
   * Generates a completion for the given messages.
   *
   * @throws {LLMError} If the completion fails
   */
  abstract complete(
    messages: LLMMessage[],
    options?: LLMCompletionOptions
  ): Promise<LLMResponse>;

  // ===========================================================================
  // Public Methods
  // ===========================================================================

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Current configuration without the API key
   */
  getConfig(): Readonly<Omit<LLMConfig, 'apiKey'>> {
    return {
      provider: this.config.provider,
      model: this.config.model,
      maxTokens: this.config.maxTokens,
      temperature: this.config.temperature,
      timeoutMs: this.config.timeoutMs,
    };
  }

  getRetryConfig(): Readonly<Required<RetryConfig>> {
    return this.retryConfig;
  }

  // ===========================================================================
  // Protected Helper Methods
  // ===========================================================================

  /**
   * Runs a provider call under this adapter's retry policy.
   */
  protected executeWithRetry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      provider: this.config.provider,
      config: this.retryConfig,
      onRetryEvent: this.onRetryEvent,
      sleepFn: this.sleepFn,
    });
  }

  protected mergeOptions(options?: LLMCompletionOptions): {
    temperature: number;
    maxTokens: number;
    responseFormat: 'text' | 'json';
  } {
    return {
      temperature: options?.temperature ?? this.config.temperature,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      responseFormat: options?.responseFormat ?? 'text',
    };
  }

  /**
   * Splits the system message (if any) from the conversation.
   */
  protected extractSystemMessage(
    messages: LLMMessage[]
  ): [string | undefined, LLMMessage[]] {
    const systemMessage = messages.find((m) => m.role === 'system');
    const otherMessages = messages.filter((m) => m.role !== 'system');

    return [systemMessage?.content, otherMessages];
  }

  /**
   * @throws {InvalidRequestError} If there is no user or assistant message
   */
  protected validateMessages(messages: LLMMessage[]): void {
    if (messages.length === 0) {
      throw new InvalidRequestError(
        'Messages array must not be empty',
        this.config.provider
      );
    }

    const nonSystemMessages = messages.filter((m) => m.role !== 'system');
    if (nonSystemMessages.length === 0) {
      throw new InvalidRequestError(
        'Messages must contain at least one user or assistant message',
        this.config.provider
      );
    }
  }
}
