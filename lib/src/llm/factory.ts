/**
 * LLM Adapter Factory
 *
 * Creates adapter instances by provider. Adapters register themselves when
 * their module is loaded; importing `./adapters/index.js` registers both.
 */

import { z } from 'zod';
import { type LLMAdapter, type LLMAdapterConfig } from './adapter.js';
import { LLMError } from './errors.js';
import {
  type LLMProvider,
  LLMConfigSchema,
  LLMErrorCode,
  DEFAULT_LLM_CONFIG,
  RECOMMENDED_MODELS,
} from './types.js';

// =============================================================================
// Adapter Registry
// =============================================================================

type AdapterConstructor = new (config: LLMAdapterConfig) => LLMAdapter;

const adapterRegistry = new Map<LLMProvider, AdapterConstructor>();

/**
 * Registers an adapter constructor for a provider.
 *
 * @example
 * ```typescript
 * registerAdapter('gemini', GeminiAdapter);
 * ```
 */
export function registerAdapter(
  provider: LLMProvider,
  constructor: AdapterConstructor
): void {
  adapterRegistry.set(provider, constructor);
}

export function isAdapterRegistered(provider: LLMProvider): boolean {
  return adapterRegistry.has(provider);
}

export function getRegisteredProviders(): LLMProvider[] {
  return Array.from(adapterRegistry.keys());
}

// =============================================================================
// Factory Functions
// =============================================================================

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

/**
 * Creates an LLM adapter for the configured provider.
 *
 * @throws {LLMError} If the configuration is invalid or the provider is not registered
 *
 * @example
 * ```typescript
 * const adapter = createLLMAdapter({
 *   provider: 'gemini',
 *   model: 'gemini-2.5-flash',
 *   apiKey: credential.key,
 *   maxTokens: 2048,
 *   temperature: 0.1,
 * });
 * ```
 */
export function createLLMAdapter(config: LLMAdapterConfig): LLMAdapter {
  const validationResult = LLMConfigSchema.safeParse(config);

  if (!validationResult.success) {
    throw new LLMError({
      code: LLMErrorCode.INVALID_REQUEST,
      message: `Invalid LLM configuration: ${formatIssues(validationResult.error)}`,
      provider: config.provider,
      retryable: false,
    });
  }

  const provider = validationResult.data.provider;
  const AdapterClass = adapterRegistry.get(provider);

  if (AdapterClass) {
    return new AdapterClass({ ...config, ...validationResult.data });
  }

  const registeredProviders = getRegisteredProviders();
  const availableMsg =
    registeredProviders.length > 0
      ? `Available providers: ${registeredProviders.join(', ')}`
      : 'No providers are currently registered. Make sure to import the adapter module first.';

  throw new LLMError({
    code: LLMErrorCode.MODEL_NOT_FOUND,
    message: `LLM provider '${provider}' is not registered. ${availableMsg}`,
    provider,
    retryable: false,
  });
}

/**
 * Builds adapters for one provider/model from API keys. The extraction
 * gateway calls it each time the credential pool hands out a key.
 */
export type AdapterProvider = (apiKey: string) => LLMAdapter;

export function createAdapterProvider(
  base: Omit<LLMAdapterConfig, 'apiKey'>
): AdapterProvider {
  return (apiKey) => createLLMAdapter({ ...base, apiKey });
}

/**
 * Adapter with the recommended model and default settings for a provider.
 */
export function createDefaultAdapter(
  provider: LLMProvider,
  apiKey: string,
  overrides?: Partial<Omit<LLMAdapterConfig, 'provider' | 'apiKey'>>
): LLMAdapter {
  return createLLMAdapter({
    ...overrides,
    provider,
    apiKey,
    model: overrides?.model ?? RECOMMENDED_MODELS[provider],
    maxTokens: overrides?.maxTokens ?? DEFAULT_LLM_CONFIG.maxTokens,
    temperature: overrides?.temperature ?? DEFAULT_LLM_CONFIG.temperature,
  });
}
