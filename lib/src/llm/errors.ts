/**
 * LLM Error Types
 *
 * Provider failures fall into three families, and callers branch on the
 * family rather than the class:
 *
 * - credential faults (rate limit, rejected key): try another API key
 * - transient failures (timeout, 5xx, dropped connection): retry in place
 * - everything else: the request itself cannot succeed
 */

import { type LLMProvider, type LLMErrorInfo, LLMErrorCode } from './types.js';

// =============================================================================
// Base LLM Error Class
// =============================================================================

export class LLMError extends Error {
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): LLMErrorCode {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  get retryAfterMs(): number | undefined {
    return this.info.retryAfterMs;
  }

  /**
   * Wraps anything thrown by a provider SDK that was not mapped already.
   */
  static fromError(error: unknown, provider: LLMProvider): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message: error instanceof Error ? error.message : 'Unknown error',
      provider,
      retryable: false,
      originalError: error,
    });
  }
}

type TransientCode =
  | typeof LLMErrorCode.TIMEOUT
  | typeof LLMErrorCode.SERVER_ERROR
  | typeof LLMErrorCode.NETWORK_ERROR;

type PermanentCode =
  | typeof LLMErrorCode.AUTH_ERROR
  | typeof LLMErrorCode.INVALID_REQUEST
  | typeof LLMErrorCode.MODEL_NOT_FOUND
  | typeof LLMErrorCode.CONTENT_FILTERED;

/**
 * Retried in place; `retryAfterMs` is set only when the server sent a hint.
 */
abstract class TransientLLMError extends LLMError {
  protected constructor(
    code: TransientCode,
    message: string,
    provider: LLMProvider,
    retryAfterMs: number | undefined,
    originalError: unknown
  ) {
    super({ code, message, provider, retryable: true, retryAfterMs, originalError });
  }
}

abstract class PermanentLLMError extends LLMError {
  protected constructor(
    code: PermanentCode,
    message: string,
    provider: LLMProvider,
    originalError: unknown
  ) {
    super({ code, message, provider, retryable: false, originalError });
  }
}

// =============================================================================
// Credential Faults
// =============================================================================

/**
 * The key hit its rate limit or quota. Retryable once the limit resets; the
 * default retry config leaves `rate_limit` out and callers switch keys.
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.RATE_LIMIT,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 60000,
      originalError,
    });
    this.name = 'RateLimitError';
  }
}

export class AuthenticationError extends PermanentLLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super(LLMErrorCode.AUTH_ERROR, message, provider, originalError);
    this.name = 'AuthenticationError';
  }
}

/**
 * How a failed request reflects on the API key that made it
 */
export type CredentialFault = 'rate_limited' | 'auth_error';

/**
 * The credential fault behind `error`, or undefined when the key is not to
 * blame.
 */
export function credentialFaultOf(error: unknown): CredentialFault | undefined {
  if (error instanceof RateLimitError) return 'rate_limited';
  if (error instanceof AuthenticationError) return 'auth_error';
  return undefined;
}

// =============================================================================
// Request Failures
// =============================================================================

export class InvalidRequestError extends PermanentLLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super(LLMErrorCode.INVALID_REQUEST, message, provider, originalError);
    this.name = 'InvalidRequestError';
  }
}

export class ModelNotFoundError extends PermanentLLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super(LLMErrorCode.MODEL_NOT_FOUND, message, provider, originalError);
    this.name = 'ModelNotFoundError';
  }
}

/**
 * The prompt or the candidate was blocked by the provider's safety filters.
 */
export class ContentFilteredError extends PermanentLLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super(LLMErrorCode.CONTENT_FILTERED, message, provider, originalError);
    this.name = 'ContentFilteredError';
  }
}

// =============================================================================
// Transient Failures
// =============================================================================

export class TimeoutError extends TransientLLMError {
  constructor(message: string, provider: LLMProvider, retryAfterMs?: number, originalError?: unknown) {
    super(LLMErrorCode.TIMEOUT, message, provider, retryAfterMs, originalError);
    this.name = 'TimeoutError';
  }
}

export class ServerError extends TransientLLMError {
  constructor(message: string, provider: LLMProvider, retryAfterMs?: number, originalError?: unknown) {
    super(LLMErrorCode.SERVER_ERROR, message, provider, retryAfterMs, originalError);
    this.name = 'ServerError';
  }
}

export class NetworkError extends TransientLLMError {
  constructor(message: string, provider: LLMProvider, retryAfterMs?: number, originalError?: unknown) {
    super(LLMErrorCode.NETWORK_ERROR, message, provider, retryAfterMs, originalError);
    this.name = 'NetworkError';
  }
}

// =============================================================================
// Status Mapping
// =============================================================================

/**
 * Error for an HTTP status returned by a provider API, or undefined when
 * the status has no specific class.
 */
export function errorFromStatus(
  status: number | undefined,
  message: string,
  provider: LLMProvider,
  originalError: unknown
): LLMError | undefined {
  if (status === 429) {
    return new RateLimitError(`Rate limit exceeded: ${message}`, provider, undefined, originalError);
  }
  if (status === 401 || status === 403) {
    return new AuthenticationError(`Authentication failed: ${message}`, provider, originalError);
  }
  if (status === 400) {
    return new InvalidRequestError(`Invalid request: ${message}`, provider, originalError);
  }
  if (status === 404) {
    return new ModelNotFoundError(`Model not found: ${message}`, provider, originalError);
  }
  if (status !== undefined && status >= 500) {
    return new ServerError(`Server error: ${message}`, provider, undefined, originalError);
  }
  return undefined;
}

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}
