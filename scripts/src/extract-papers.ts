#!/usr/bin/env tsx
/**
 * Paper Extraction Script
 *
 * Reads the first page of every PDF under `<inputDir>/part_<N>/`, asks the
 * configured LLM for the paper's author, year, title and abstract, and
 * appends one row per file to the output CSV.
 *
 * The run is resumable: files already in the output are skipped, so
 * re-running the same command continues where the last run stopped. After
 * each subfolder the operator is asked whether to continue.
 *
 * Usage:
 *   npx tsx scripts/src/extract-papers.ts [options]
 *   # or via npm script, from the repository root:
 *   npm run extract -- [options]
 *
 * Options:
 *   --config=PATH       YAML config file (default: config/extractor.yaml)
 *   --input=DIR         Input directory with part_N subfolders
 *   --output=PATH       Output CSV file
 *   --limit=N           Stop after N files have been attempted
 *   --dry-run           List pending files without calling the LLM
 *   --retry-failed      Drop Failed rows from the output and try those files again
 *   --yes               Continue to the next subfolder without asking
 *   --verbose           Show detailed logging
 *   --quiet             Minimal output (errors only)
 *   --log-format=FMT    Log format: text, json, compact, pretty (default: pretty)
 *
 * Relative paths (the config file, the input directory and the output file)
 * are resolved against the directory npm was started from. Variables from a
 * `.env` file there are loaded unless already set.
 *
 * Environment variables:
 *   - GEMINI_API_KEY_1, GEMINI_API_KEY_2, ...: API keys, rotated on rate limits
 *   - GEMINI_API_KEYS: comma-separated API keys
 *   - GEMINI_API_KEY: a single API key
 *   (ANTHROPIC_API_KEY* when the provider is anthropic, or credentials.envPrefix)
 *   - LOG_LEVEL: error, warn, info, debug or trace when neither --verbose nor --quiet is given
 *
 * Examples:
 *   npm run extract -- --dry-run
 *   npm run extract -- --limit=5 --verbose
 *   npm run extract -- --retry-failed --yes
 */

import path from 'node:path';
import {
  // Configuration
  type AppConfig,
  type ConfigOverrides,
  loadConfig,
  loadEnvFile,
  DEFAULT_ENV_FILE,
  validateCredentialsEnv,
  isConfigError,
  // LLM
  createAdapterProvider,
  type RetryEvent,
  // PDF
  FirstPageExtractor,
  // Credentials
  CredentialPool,
  // Extraction
  ExtractionGateway,
  // Store
  CsvProgressStore,
  // Batch
  BatchOrchestrator,
  AutoContinueGate,
  ConsoleOperatorGate,
  RunOutcome,
  isDiscoveryError,
  type PaperProcessor,
  type OperatorGate,
  // Progress
  createRunReporter,
  // Logging
  Logger,
  createLogger,
  setGlobalLogger,
  parseLogLevel,
  LogLevel,
  LogFormat,
  LogFormatSchema,
} from '@paper-extractor/lib';

// ============================================================================
// Types
// ============================================================================

interface ParsedArgs {
  configPath?: string;
  input?: string;
  output?: string;
  limit?: number;
  dryRun: boolean;
  retryFailed: boolean;
  yes: boolean;
  verbose: boolean;
  quiet: boolean;
  logFormat: LogFormat;
}

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

// ============================================================================
// Argument Parsing
// ============================================================================

function parseArgs(): ParsedArgs {
  const args = process.argv.slice(2);

  const result: ParsedArgs = {
    dryRun: false,
    retryFailed: false,
    yes: false,
    verbose: false,
    quiet: false,
    logFormat: LogFormat.PRETTY,
  };

  for (const arg of args) {
    if (arg === '--dry-run') {
      result.dryRun = true;
    } else if (arg === '--retry-failed') {
      result.retryFailed = true;
    } else if (arg === '--yes') {
      result.yes = true;
    } else if (arg === '--verbose') {
      result.verbose = true;
    } else if (arg === '--quiet') {
      result.quiet = true;
    } else if (arg.startsWith('--config=')) {
      result.configPath = arg.slice(9);
    } else if (arg.startsWith('--input=')) {
      result.input = arg.slice(8);
    } else if (arg.startsWith('--output=')) {
      result.output = arg.slice(9);
    } else if (arg.startsWith('--limit=')) {
      const limit = Number.parseInt(arg.slice(8), 10);
      if (!Number.isInteger(limit) || limit < 1) {
        failUsage(`--limit must be a positive integer, got '${arg.slice(8)}'`);
      }
      result.limit = limit;
    } else if (arg.startsWith('--log-format=')) {
      const format = LogFormatSchema.safeParse(arg.slice(13));
      if (!format.success) {
        failUsage(`Unknown log format '${arg.slice(13)}'`);
      }
      result.logFormat = format.data;
    } else if (arg === '--help' || arg === '-h') {
      printHelp();
      process.exit(EXIT_OK);
    } else {
      failUsage(`Unknown option '${arg}'`);
    }
  }

  return result;
}

function failUsage(message: string): never {
  console.error(`${message}\nRun with --help for usage.`);
  process.exit(EXIT_FAILURE);
}

function printHelp(): void {
  console.log(`
Paper Extraction Script - bibliographic metadata from PDF papers

Usage:
  npm run extract -- [options]

Options:
  --config=PATH       YAML config file (default: config/extractor.yaml)
  --input=DIR         Input directory with part_N subfolders
  --output=PATH       Output CSV file
  --limit=N           Stop after N files have been attempted
  --dry-run           List pending files without calling the LLM
  --retry-failed      Drop Failed rows from the output and try those files again
  --yes               Continue to the next subfolder without asking
  --verbose           Show detailed logging (DEBUG level)
  --quiet             Minimal output (ERROR level only)
  --log-format=FMT    Log format: text, json, compact, pretty (default: pretty)
  -h, --help          Show this help message

API keys are read from GEMINI_API_KEY_1, GEMINI_API_KEY_2, ..., GEMINI_API_KEYS
(comma-separated) or GEMINI_API_KEY. With provider 'anthropic' the prefix is
ANTHROPIC_API_KEY; credentials.envPrefix in the config overrides both.
LOG_LEVEL sets the log level when neither --verbose nor --quiet is given.
Variables can also be put in a .env file; see .env.example.

Exit codes:
  0    run completed, or stopped by the operator
  1    run halted (all keys exhausted, output not writable) or failed to start
  130  interrupted with Ctrl+C

Examples:
  npm run extract -- --dry-run
  npm run extract -- --limit=5 --verbose
  npm run extract -- --retry-failed --yes
`);
}

// ============================================================================
// Wiring
// ============================================================================

function buildOverrides(args: ParsedArgs): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (args.input !== undefined) overrides['inputDir'] = args.input;
  if (args.output !== undefined) overrides['outputPath'] = args.output;
  return overrides;
}

function logRetryEvent(logger: Logger): (event: RetryEvent) => void {
  return (event) => {
    if (event.type === 'retrying') {
      logger.warn('Retrying LLM request', {
        attempt: event.attemptNumber,
        maxRetries: event.maxRetries,
        delayMs: event.nextDelayMs,
        error: event.error?.message,
      });
    } else if (event.type === 'max_retries_exceeded') {
      logger.debug('LLM retries exhausted', { error: event.error?.code });
    }
  };
}

/**
 * Gateway for a real run. Dry runs never call it, so they work without keys.
 */
function buildProcessor(
  config: Readonly<AppConfig>,
  keys: string[],
  logger: Logger
): { processor: PaperProcessor; pool: CredentialPool } {
  const pool = new CredentialPool(keys, {
    cooldownMs: config.credentials.cooldownMs,
    logger: logger.child('credentials'),
  });

  const createAdapter = createAdapterProvider({
    provider: config.provider,
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
    retry: {
      maxRetries: config.retry.apiRetries,
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    },
    onRetryEvent: logRetryEvent(logger.child('llm')),
  });

  const processor = new ExtractionGateway({
    pdf: new FirstPageExtractor({ logger: logger.child('pdf') }),
    pool,
    createAdapter,
    prompt: config.prompt,
    maxParseAttempts: config.retry.maxParseAttempts,
    logger: logger.child('gateway'),
  });

  return { processor, pool };
}

const noProcessor: PaperProcessor = {
  process: () => Promise.reject(new Error('No LLM calls are made in a dry run')),
};

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<number> {
  const args = parseArgs();
  // npm runs scripts from the package directory; INIT_CWD is where it was started
  const baseDir = process.env['INIT_CWD'] ?? process.cwd();

  let envVariables: string[];
  try {
    envVariables = await loadEnvFile(path.join(baseDir, DEFAULT_ENV_FILE));
  } catch (error) {
    if (isConfigError(error)) {
      console.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const logger = createLogger('extract-papers', {
    level: args.verbose
      ? LogLevel.DEBUG
      : args.quiet
        ? LogLevel.ERROR
        : parseLogLevel(process.env['LOG_LEVEL'] ?? 'info'),
    format: args.logFormat,
  });
  setGlobalLogger(logger);
  if (envVariables.length > 0) {
    logger.debug('Loaded environment file', { variables: envVariables.length });
  }

  let config: Readonly<AppConfig>;
  try {
    config = await loadConfig({
      path: args.configPath,
      overrides: buildOverrides(args),
      baseDir,
    });
  } catch (error) {
    if (isConfigError(error)) {
      logger.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }

  logger.info('Configuration loaded', {
    provider: config.provider,
    model: config.model,
    inputDir: config.inputDir,
    outputPath: config.outputPath,
  });

  const credentials = validateCredentialsEnv(config);
  for (const warning of credentials.warnings) {
    logger.warn(warning);
  }

  let processor = noProcessor;
  let pool: CredentialPool | undefined;
  if (!args.dryRun) {
    if (!credentials.isValid) {
      for (const error of credentials.errors) {
        logger.error(error);
      }
      return EXIT_FAILURE;
    }
    ({ processor, pool } = buildProcessor(config, credentials.keys, logger));
    logger.info('API keys loaded', { count: pool.size });
  }

  const controller = new AbortController();
  let interrupted = false;
  const onSigint = (): void => {
    if (interrupted) {
      logger.warn('Interrupted twice, exiting immediately');
      process.exit(EXIT_INTERRUPTED);
    }
    interrupted = true;
    logger.warn('Interrupt received, stopping after the current file (Ctrl+C again to force)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const operator: OperatorGate = args.yes
    ? new AutoContinueGate()
    : new ConsoleOperatorGate({ signal: controller.signal });

  const orchestrator = new BatchOrchestrator({
    inputDir: config.inputDir,
    subfolderPrefix: config.subfolderPrefix,
    processor,
    store: new CsvProgressStore(config.outputPath, { logger: logger.child('store') }),
    operator,
    credentials: pool,
    events: createRunReporter(logger.child('progress')),
    logger: logger.child('batch'),
    signal: controller.signal,
  });

  try {
    const summary = await orchestrator.run({
      limit: args.limit,
      dryRun: args.dryRun,
      retryFailed: args.retryFailed,
    });

    if (interrupted) return EXIT_INTERRUPTED;
    return summary.outcome === RunOutcome.HALTED ? EXIT_FAILURE : EXIT_OK;
  } catch (error) {
    if (isDiscoveryError(error)) {
      logger.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected error:', error);
    process.exit(EXIT_FAILURE);
  });
