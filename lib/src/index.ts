/**
 * Paper Extractor - Shared Library
 *
 * Batch extraction of bibliographic metadata from PDF papers with an LLM.
 */

// Logging
export * from './logging/index.js';

// LLM (Language Model Adapters); importing the adapters registers them
export * from './llm/index.js';

// PDF Text Extraction
export * from './pdf/index.js';

// API Key Rotation
export * from './credentials/index.js';

// Extraction Gateway (PDF text -> LLM -> record)
export * from './extraction/index.js';

// Output Persistence
export * from './store/index.js';

// Batch Orchestration
export * from './batch/index.js';

// Progress Reporting
export * from './progress/index.js';

// Configuration
export * from './config/index.js';
