/**
 * LLM Adapter Types
 *
 * Provider-neutral types for the adapters that analyze paper text.
 * Gemini is the default provider; Anthropic is available as an alternative.
 */

import { z } from 'zod';

// ============================================================================
// LLM Provider Types
// ============================================================================

export const LLMProvider = {
  GEMINI: 'gemini',
  ANTHROPIC: 'anthropic',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

export const LLMProviderSchema = z.enum(['gemini', 'anthropic']);

// ============================================================================
// Message Types
// ============================================================================

export const LLMMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string().min(1),
});

export type LLMMessage = z.infer<typeof LLMMessageSchema>;

// ============================================================================
// Configuration Types
// ============================================================================

export const LLMConfigSchema = z.object({
  provider: LLMProviderSchema,
  /** Model identifier (e.g., 'gemini-2.5-flash') */
  model: z.string().min(1),
  /** API key used for every request made by this adapter */
  apiKey: z.string().min(1),
  /** Maximum tokens in the response */
  maxTokens: z.number().int().positive().max(100000),
  /** Temperature for response randomness (0-2) */
  temperature: z.number().min(0).max(2),
  /** Per-request timeout in milliseconds */
  timeoutMs: z.number().int().positive().optional(),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

// ============================================================================
// Request / Response Types
// ============================================================================

export interface LLMCompletionOptions {
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  /** Ask the provider for a JSON document instead of free text */
  responseFormat?: 'text' | 'json' | undefined;
}

export interface LLMTokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  content: string;
  usage: LLMTokenUsage;
  model: string;
}

// ============================================================================
// Error Types
// ============================================================================

export const LLMErrorCode = {
  /** Rate limit or quota exceeded */
  RATE_LIMIT: 'rate_limit',
  /** Invalid API key or authentication failure */
  AUTH_ERROR: 'auth_error',
  /** Invalid request parameters */
  INVALID_REQUEST: 'invalid_request',
  /** Model not found or not available */
  MODEL_NOT_FOUND: 'model_not_found',
  /** Prompt or response blocked by safety filters */
  CONTENT_FILTERED: 'content_filtered',
  TIMEOUT: 'timeout',
  SERVER_ERROR: 'server_error',
  NETWORK_ERROR: 'network_error',
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export interface LLMErrorInfo {
  code: LLMErrorCode;
  message: string;
  provider: LLMProvider;
  retryable: boolean;
  /** Suggested retry delay in milliseconds */
  retryAfterMs?: number | undefined;
  originalError?: unknown;
}

// ============================================================================
// Retry Configuration Types
// ============================================================================

export const RetryConfigSchema = z.object({
  /** Maximum number of retry attempts (excluding the initial request) */
  maxRetries: z.number().int().nonnegative().default(2),
  initialDelayMs: z.number().int().positive().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
  backoffMultiplier: z.number().positive().default(2),
  jitter: z.boolean().default(true),
  /** Maximum jitter as a fraction of the delay (0.0 to 1.0) */
  jitterFactor: z.number().min(0).max(1).default(0.25),
  /**
   * Error codes retried in place with the same key. The defaults leave out
   * `rate_limit`, which the extraction gateway handles by rotation.
   */
  retryableErrorCodes: z
    .array(z.enum(['rate_limit', 'timeout', 'server_error', 'network_error']))
    .optional(),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  jitterFactor: 0.25,
  retryableErrorCodes: ['timeout', 'server_error', 'network_error'],
};

export interface RetryEvent {
  type: 'attempt_failed' | 'retrying' | 'max_retries_exceeded';
  /** 1-based */
  attemptNumber: number;
  maxRetries: number;
  error?: LLMErrorInfo | undefined;
  nextDelayMs?: number | undefined;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_LLM_CONFIG = {
  maxTokens: 2048,
  temperature: 0.1,
} as const;

export const RECOMMENDED_MODELS: Record<LLMProvider, string> = {
  gemini: 'gemini-2.5-flash',
  anthropic: 'claude-3-5-haiku-20241022',
};
