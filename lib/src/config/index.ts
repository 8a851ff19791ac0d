/**
 * Configuration Module
 */

export {
  DEFAULT_ENV_PREFIX,
  DEFAULT_PROMPT,
  RetrySettingsSchema,
  CredentialSettingsSchema,
  AppConfigSchema,
  type AppConfigInput,
  type AppConfig,
  ConfigError,
  isConfigError,
} from './schema.js';

export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_ENV_FILE,
  type ConfigOverrides,
  type LoadConfigOptions,
  loadConfig,
  parseConfig,
  type CredentialEnvValidation,
  validateCredentialsEnv,
  deepMerge,
  loadEnvFile,
} from './loader.js';
