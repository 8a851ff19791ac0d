/**
 * Configuration Loader
 *
 * Reads the YAML config file, applies command-line overrides and validates
 * the result. API keys never live in the file; they come from the
 * environment under `credentials.envPrefix`.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseDotEnv } from 'dotenv';
import { parse } from 'yaml';
import type { ZodIssue } from 'zod';
import { collectCredentialsFromEnv } from '../credentials/index.js';
import { type AppConfig, AppConfigSchema, ConfigError } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'config/extractor.yaml';
export const DEFAULT_ENV_FILE = '.env';

type PlainObject = Record<string, unknown>;

/**
 * Overrides applied on top of the file, e.g. from CLI flags.
 * Nested objects merge; everything else replaces.
 */
export type ConfigOverrides = PlainObject;

export interface LoadConfigOptions {
  /** Config file path; when omitted the default path is tried and may be absent */
  path?: string | undefined;
  overrides?: ConfigOverrides | undefined;
  /**
   * Directory that relative paths are resolved against: the config file,
   * `inputDir` and `outputPath`. When omitted they stay relative to the
   * process working directory.
   */
  baseDir?: string | undefined;
}

/**
 * Load and validate the application config.
 *
 * @throws ConfigError when an explicit path is missing, the YAML is malformed
 *   or a value fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Readonly<AppConfig>> {
  const { baseDir } = options;
  const explicit = options.path !== undefined;
  const requested = options.path ?? DEFAULT_CONFIG_PATH;
  const filePath = baseDir !== undefined ? path.resolve(baseDir, requested) : requested;

  const fromFile = await readConfigFile(filePath, explicit);
  const merged = deepMerge(fromFile ?? {}, options.overrides ?? {});

  const config = parseConfig(merged, fromFile !== undefined ? filePath : undefined);
  if (baseDir === undefined) {
    return config;
  }
  return deepFreeze({
    ...config,
    inputDir: path.resolve(baseDir, config.inputDir),
    outputPath: path.resolve(baseDir, config.outputPath),
  });
}

/**
 * Validate a raw config object
 */
export function parseConfig(raw: unknown, filePath?: string): Readonly<AppConfig> {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const where = filePath ? ` in ${filePath}` : '';
    throw new ConfigError(
      `Invalid configuration${where}: ${result.error.issues.map(formatIssue).join('; ')}`,
      filePath
    );
  }
  return deepFreeze(result.data);
}

async function readConfigFile(filePath: string, explicit: boolean): Promise<PlainObject | undefined> {
  let source: string;
  try {
    source = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error) && !explicit) {
      return undefined;
    }
    const reason = isNotFound(error) ? 'file not found' : String(error);
    throw new ConfigError(`Cannot read config ${filePath}: ${reason}`, filePath);
  }

  let document: unknown;
  try {
    document = parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Malformed YAML in ${filePath}: ${message}`, filePath);
  }

  // An empty document parses to null
  if (document === null || document === undefined) {
    return {};
  }
  if (!isPlainObject(document)) {
    throw new ConfigError(`Config ${filePath} must be a mapping at the top level`, filePath);
  }
  return document;
}

// =============================================================================
// Credentials
// =============================================================================

export interface CredentialEnvValidation {
  isValid: boolean;
  keys: string[];
  warnings: string[];
  errors: string[];
}

/**
 * Collect the API keys for the configured provider and report problems
 */
export function validateCredentialsEnv(
  config: Pick<AppConfig, 'credentials'>,
  env: Readonly<Record<string, string | undefined>> = process.env
): CredentialEnvValidation {
  const prefix = config.credentials.envPrefix;
  const keys = collectCredentialsFromEnv(env, prefix);
  const warnings: string[] = [];
  const errors: string[] = [];

  if (keys.length === 0) {
    errors.push(`No API keys found. Set ${prefix}, ${prefix}S or ${prefix}_1, ${prefix}_2, ...`);
  } else if (keys.length === 1) {
    warnings.push(`Only one API key found under ${prefix}; rate limits cannot be rotated around`);
  }

  return { isValid: errors.length === 0, keys, warnings, errors };
}

/**
 * Copy variables from a dotenv file into `env` without replacing ones that
 * are already set. A missing file is not an error.
 *
 * @returns the names of the variables that were set
 */
export async function loadEnvFile(
  filePath: string,
  env: Record<string, string | undefined> = process.env
): Promise<string[]> {
  let source: string;
  try {
    source = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw new ConfigError(`Cannot read environment file ${filePath}: ${String(error)}`, filePath);
  }

  const applied: string[] = [];
  for (const [name, value] of Object.entries(parseDotEnv(source))) {
    if (env[name] === undefined) {
      env[name] = value;
      applied.push(name);
    }
  }
  return applied;
}

// =============================================================================
// Helpers
// =============================================================================

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return isPlainObject(error) && error['code'] === 'ENOENT';
}

export function deepMerge(base: PlainObject, overrides: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] =
      isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
