/**
 * Extraction Module
 */

export {
  type FileKey,
  makeFileKey,
  PaperStatus,
  type PaperFile,
  UNKNOWN_YEAR,
  type PublicationYear,
  type ExtractedRecord,
  RESPONSE_FIELDS,
  type ResponseField,
  ExtractionResponseSchema,
  type ExtractionResponse,
  TEXT_PLACEHOLDER,
  PromptConfigSchema,
  type PromptConfig,
  FailureStage,
  FailureCause,
  type ExtractionFailed,
  type GatewayResult,
  isRunFatal,
} from './types.js';

export {
  truncateText,
  renderSystemPrompt,
  renderUserPrompt,
  buildExtractionMessages,
} from './prompt.js';

export {
  type ParsedMetadata,
  type ParseOutcome,
  unwrapCodeFence,
  normalizeYear,
  parseExtractionResponse,
} from './parse.js';

export {
  ExtractionGateway,
  type ExtractionGatewayOptions,
  DEFAULT_MAX_PARSE_ATTEMPTS,
} from './gateway.js';
