/**
 * LLM Adapters
 *
 * Importing this module registers every adapter with the factory.
 */

export * from './gemini.js';
export * from './anthropic.js';
