/**
 * Unit Tests for Anthropic Adapter
 *
 * Tests the AnthropicAdapter class against a mocked Anthropic SDK, so no
 * actual API calls are made.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { AnthropicAdapter } from '../../../lib/src/llm/adapters/anthropic.js';
import type { LLMAdapterConfig } from '../../../lib/src/llm/adapter.js';
import {
  LLMError,
  RateLimitError,
  AuthenticationError,
  InvalidRequestError,
  ModelNotFoundError,
  ServerError,
  TimeoutError,
  NetworkError,
} from '../../../lib/src/llm/errors.js';
import type { LLMMessage, RetryEvent } from '../../../lib/src/llm/types.js';

// =============================================================================
// Mock Setup
// =============================================================================

const { MockAPIError, MockAPIConnectionError, MockAPIConnectionTimeoutError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    readonly status: number | undefined;
    constructor(status: number | undefined, message: string) {
      super(message);
      this.name = 'APIError';
      this.status = status;
    }
  }

  // Same hierarchy as the SDK: connection errors are APIErrors without a status
  class MockAPIConnectionError extends MockAPIError {
    constructor(message: string) {
      super(undefined, message);
      this.name = 'APIConnectionError';
    }
  }

  class MockAPIConnectionTimeoutError extends MockAPIConnectionError {
    constructor(message: string) {
      super(message);
      this.name = 'APIConnectionTimeoutError';
    }
  }

  return { MockAPIError, MockAPIConnectionError, MockAPIConnectionTimeoutError };
});

vi.mock('@anthropic-ai/sdk', () => ({
  default: Object.assign(vi.fn(), {
    APIError: MockAPIError,
    APIConnectionError: MockAPIConnectionError,
    APIConnectionTimeoutError: MockAPIConnectionTimeoutError,
  }),
  APIError: MockAPIError,
  APIConnectionError: MockAPIConnectionError,
  APIConnectionTimeoutError: MockAPIConnectionTimeoutError,
}));

// =============================================================================
// Test Fixtures
// =============================================================================

const createMockConfig = (overrides: Partial<LLMAdapterConfig> = {}): LLMAdapterConfig => ({
  provider: 'anthropic',
  model: 'claude-3-5-haiku-20241022',
  maxTokens: 2048,
  temperature: 0.1,
  apiKey: 'test-api-key',
  retry: { maxRetries: 0 },
  ...overrides,
});

const createMockMessages = (): LLMMessage[] => [
  { role: 'system', content: 'Extract the paper metadata.' },
  { role: 'user', content: 'Paper text: A Study of Things' },
];

const createMockResponse = (text = '{"title":"A Study of Things"}') => ({
  id: 'msg_123',
  type: 'message' as const,
  role: 'assistant' as const,
  content: [{ type: 'text' as const, text }],
  model: 'claude-3-5-haiku-20241022',
  stop_reason: 'end_turn',
  usage: {
    input_tokens: 120,
    output_tokens: 30,
  },
});

// =============================================================================
// Test Suites
// =============================================================================

describe('AnthropicAdapter', () => {
  let mockClient: {
    messages: {
      create: ReturnType<typeof vi.fn>;
    };
  };

  beforeEach(() => {
    vi.clearAllMocks();

    mockClient = {
      messages: {
        create: vi.fn(),
      },
    };

    vi.mocked(Anthropic).mockImplementation(function () {
      return mockClient as unknown as Anthropic;
    });
  });

  // ===========================================================================
  // Constructor Tests
  // ===========================================================================

  describe('constructor', () => {
    it('should create an adapter with provided configuration', () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      expect(adapter.provider).toBe('anthropic');
      expect(adapter.model).toBe('claude-3-5-haiku-20241022');
      expect(adapter.getConfig().maxTokens).toBe(2048);
      expect(adapter.getConfig().temperature).toBe(0.1);
    });

    it('should disable SDK retries and pass the API key', () => {
      new AnthropicAdapter(createMockConfig({ apiKey: 'test-secret' }));

      expect(Anthropic).toHaveBeenCalledWith({ apiKey: 'test-secret', maxRetries: 0 });
    });

    it('should pass the request timeout to the client', () => {
      new AnthropicAdapter(createMockConfig({ timeoutMs: 30000 }));

      expect(Anthropic).toHaveBeenCalledWith({
        apiKey: 'test-api-key',
        maxRetries: 0,
        timeout: 30000,
      });
    });

    it('should not expose the API key in getConfig()', () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      expect(adapter.getConfig()).not.toHaveProperty('apiKey');
    });
  });

  // ===========================================================================
  // complete() Method Tests
  // ===========================================================================

  describe('complete()', () => {
    it('should generate a completion successfully', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockResolvedValue(createMockResponse());

      const response = await adapter.complete(createMockMessages());

      expect(response.content).toBe('{"title":"A Study of Things"}');
      expect(response.model).toBe('claude-3-5-haiku-20241022');
      expect(response.usage).toEqual({ inputTokens: 120, outputTokens: 30 });
    });

    it('should send the system message separately', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockResolvedValue(createMockResponse());

      await adapter.complete(createMockMessages());

      expect(mockClient.messages.create).toHaveBeenCalledWith({
        model: 'claude-3-5-haiku-20241022',
        max_tokens: 2048,
        temperature: 0.1,
        system: 'Extract the paper metadata.',
        messages: [{ role: 'user', content: 'Paper text: A Study of Things' }],
      });
    });

    it('should append the JSON instruction when JSON output is requested', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockResolvedValue(createMockResponse());

      await adapter.complete(createMockMessages(), { responseFormat: 'json' });

      expect(mockClient.messages.create).toHaveBeenCalledWith(
        expect.objectContaining({
          system:
            'Extract the paper metadata.\n\nRespond with a single JSON object and nothing else.',
        })
      );
    });

    it('should use the JSON instruction alone when there is no system message', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockResolvedValue(createMockResponse());

      await adapter.complete([{ role: 'user', content: 'Hello' }], { responseFormat: 'json' });

      expect(mockClient.messages.create).toHaveBeenCalledWith(
        expect.objectContaining({
          system: 'Respond with a single JSON object and nothing else.',
        })
      );
    });

    it('should override config with completion options', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockResolvedValue(createMockResponse());

      await adapter.complete(createMockMessages(), { temperature: 0.5, maxTokens: 512 });

      expect(mockClient.messages.create).toHaveBeenCalledWith(
        expect.objectContaining({ temperature: 0.5, max_tokens: 512 })
      );
    });

    it('should throw InvalidRequestError for empty messages array', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      await expect(adapter.complete([])).rejects.toThrow(InvalidRequestError);
      expect(mockClient.messages.create).not.toHaveBeenCalled();
    });

    it('should throw InvalidRequestError for messages with only system message', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      await expect(
        adapter.complete([{ role: 'system', content: 'You are helpful.' }])
      ).rejects.toThrow(InvalidRequestError);
    });

    it('should combine multiple text content blocks', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockResolvedValue({
        ...createMockResponse(),
        content: [
          { type: 'text', text: '{"title":' },
          { type: 'text', text: '"X"}' },
        ],
      });

      const response = await adapter.complete(createMockMessages());

      expect(response.content).toBe('{"title":"X"}');
    });

    it('should filter out non-text content blocks', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockResolvedValue({
        ...createMockResponse(),
        content: [
          { type: 'text', text: '{}' },
          { type: 'tool_use', id: 'tool_1', name: 'search', input: {} },
        ],
      });

      const response = await adapter.complete(createMockMessages());

      expect(response.content).toBe('{}');
    });
  });

  // ===========================================================================
  // Error Handling Tests
  // ===========================================================================

  describe('error handling', () => {
    it('should throw RateLimitError for 429 status', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockRejectedValue(new MockAPIError(429, 'Too many requests'));

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(RateLimitError);
    });

    it('should throw AuthenticationError for 401 and 403 status', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());

      mockClient.messages.create.mockRejectedValueOnce(new MockAPIError(401, 'Invalid API key'));
      await expect(adapter.complete(createMockMessages())).rejects.toThrow(AuthenticationError);

      mockClient.messages.create.mockRejectedValueOnce(new MockAPIError(403, 'Forbidden'));
      await expect(adapter.complete(createMockMessages())).rejects.toThrow(AuthenticationError);
    });

    it('should throw InvalidRequestError for 400 status', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockRejectedValue(new MockAPIError(400, 'Bad parameters'));

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(InvalidRequestError);
    });

    it('should throw ModelNotFoundError for 404 status', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockRejectedValue(new MockAPIError(404, 'Model not found'));

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(ModelNotFoundError);
    });

    it('should throw ServerError for 5xx status', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockRejectedValue(new MockAPIError(529, 'Overloaded'));

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(ServerError);
    });

    it('should throw TimeoutError for APIConnectionTimeoutError', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockRejectedValue(
        new MockAPIConnectionTimeoutError('Request timed out')
      );

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(TimeoutError);
    });

    it('should throw NetworkError for APIConnectionError', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockRejectedValue(
        new MockAPIConnectionError('Connection refused')
      );

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(NetworkError);
    });

    it('should throw generic LLMError for unknown errors', async () => {
      const adapter = new AnthropicAdapter(createMockConfig());
      mockClient.messages.create.mockRejectedValue(new Error('Something odd'));

      const error: unknown = await adapter.complete(createMockMessages()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LLMError);
      expect(error instanceof LLMError && error.code).toBe('unknown');
      expect(error instanceof Error && error.message).toBe('Something odd');
    });
  });

  // ===========================================================================
  // Retry Behavior Tests
  // ===========================================================================

  describe('retry behavior', () => {
    it('should retry on server error', async () => {
      const sleepFn = vi.fn().mockResolvedValue(undefined);
      const adapter = new AnthropicAdapter(
        createMockConfig({
          retry: { maxRetries: 2, initialDelayMs: 100, jitter: false },
          sleepFn,
        })
      );
      mockClient.messages.create
        .mockRejectedValueOnce(new MockAPIError(500, 'Internal server error'))
        .mockResolvedValueOnce(createMockResponse());

      const response = await adapter.complete(createMockMessages());

      expect(response.content).toBe('{"title":"A Study of Things"}');
      expect(mockClient.messages.create).toHaveBeenCalledTimes(2);
      expect(sleepFn).toHaveBeenCalledWith(100);
    });

    it('should not retry on rate limit error', async () => {
      const adapter = new AnthropicAdapter(
        createMockConfig({ retry: { maxRetries: 3 }, sleepFn: vi.fn() })
      );
      mockClient.messages.create.mockRejectedValue(new MockAPIError(429, 'Too many requests'));

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(RateLimitError);
      expect(mockClient.messages.create).toHaveBeenCalledTimes(1);
    });

    it('should not retry on authentication error', async () => {
      const adapter = new AnthropicAdapter(
        createMockConfig({ retry: { maxRetries: 3 }, sleepFn: vi.fn() })
      );
      mockClient.messages.create.mockRejectedValue(new MockAPIError(401, 'Invalid API key'));

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(AuthenticationError);
      expect(mockClient.messages.create).toHaveBeenCalledTimes(1);
    });

    it('should emit retry events', async () => {
      const retryEvents: RetryEvent[] = [];
      const adapter = new AnthropicAdapter(
        createMockConfig({
          retry: { maxRetries: 1, initialDelayMs: 100, jitter: false },
          onRetryEvent: (event) => retryEvents.push(event),
          sleepFn: vi.fn().mockResolvedValue(undefined),
        })
      );
      mockClient.messages.create
        .mockRejectedValueOnce(new MockAPIConnectionTimeoutError('Request timed out'))
        .mockResolvedValueOnce(createMockResponse());

      await adapter.complete(createMockMessages());

      expect(retryEvents.map((e) => e.type)).toEqual(['attempt_failed', 'retrying']);
      expect(retryEvents[1]?.nextDelayMs).toBe(100);
    });

    it('should throw after max retries exceeded', async () => {
      const adapter = new AnthropicAdapter(
        createMockConfig({
          retry: { maxRetries: 2, initialDelayMs: 50, jitter: false },
          sleepFn: vi.fn().mockResolvedValue(undefined),
        })
      );
      mockClient.messages.create.mockRejectedValue(new MockAPIError(500, 'Internal server error'));

      await expect(adapter.complete(createMockMessages())).rejects.toThrow(ServerError);
      // Initial attempt + maxRetries
      expect(mockClient.messages.create).toHaveBeenCalledTimes(3);
    });
  });
});
