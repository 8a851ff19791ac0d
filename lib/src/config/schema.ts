/**
 * Application Configuration Schema
 *
 * Validated shape of `config/extractor.yaml`. Every field has a default, so
 * an empty file is a valid configuration.
 */

import { z } from 'zod';
import { LLMProviderSchema, RECOMMENDED_MODELS, type LLMProvider } from '../llm/index.js';
import { PromptConfigSchema } from '../extraction/index.js';
import { DEFAULT_COOLDOWN_MS } from '../credentials/index.js';
import { DEFAULT_SUBFOLDER_PREFIX } from '../batch/index.js';

/**
 * Environment variable prefix for API keys, per provider
 */
export const DEFAULT_ENV_PREFIX: Record<LLMProvider, string> = {
  gemini: 'GEMINI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

export const DEFAULT_PROMPT = {
  system:
    'You are an assistant that reads the first page of an academic paper and ' +
    'extracts its bibliographic metadata. Copy the title and abstract as written.',
  user: 'Paper text:\n{{text}}',
  maxInputChars: 15000,
  fields: {
    author_surname: 'surname of the first author',
    author_initial: 'initial of the first name of the first author, e.g. "J."',
    year: 'four-digit publication year',
    title: 'full title of the paper',
    abstract: 'full abstract, or an empty string if the page has none',
  },
} as const;

export const RetrySettingsSchema = z.object({
  /** Analysis attempts per file when the response cannot be parsed */
  maxParseAttempts: z.number().int().positive().default(2),
  /** In-place retries of transient API errors (timeouts, 5xx, network) */
  apiRetries: z.number().int().nonnegative().default(2),
  initialDelayMs: z.number().int().positive().default(1000),
  maxDelayMs: z.number().int().positive().default(30000),
});

export const CredentialSettingsSchema = z.object({
  cooldownMs: z.number().int().nonnegative().default(DEFAULT_COOLDOWN_MS),
  /** Defaults to the provider's prefix, e.g. GEMINI_API_KEY */
  envPrefix: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name')
    .optional(),
});

export const AppConfigSchema = z
  .object({
    provider: LLMProviderSchema.default('gemini'),
    /** Defaults to the provider's recommended model */
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0.1),
    maxTokens: z.number().int().positive().max(100000).default(2048),
    /** Per-request timeout */
    timeoutMs: z.number().int().positive().default(120000),

    inputDir: z.string().min(1).default('papers_to_identify'),
    outputPath: z.string().min(1).default('output/papers_identified.csv'),
    subfolderPrefix: z.string().min(1).default(DEFAULT_SUBFOLDER_PREFIX),

    prompt: PromptConfigSchema.extend({
      system: PromptConfigSchema.shape.system.default(DEFAULT_PROMPT.system),
      user: PromptConfigSchema.shape.user.default(DEFAULT_PROMPT.user),
      maxInputChars: PromptConfigSchema.shape.maxInputChars.default(DEFAULT_PROMPT.maxInputChars),
      fields: PromptConfigSchema.shape.fields.default(DEFAULT_PROMPT.fields),
    }).default({}),
    retry: RetrySettingsSchema.default({}),
    credentials: CredentialSettingsSchema.default({}),
  })
  .strict()
  .transform((config) => ({
    ...config,
    model: config.model ?? RECOMMENDED_MODELS[config.provider],
    credentials: {
      ...config.credentials,
      envPrefix: config.credentials.envPrefix ?? DEFAULT_ENV_PREFIX[config.provider],
    },
  }));

export type AppConfigInput = z.input<typeof AppConfigSchema>;

export type AppConfig = z.output<typeof AppConfigSchema>;

export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';
  readonly filePath: string | undefined;

  constructor(message: string, filePath?: string) {
    super(message);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
