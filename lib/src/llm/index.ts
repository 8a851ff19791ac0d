/**
 * LLM Module
 */

export * from './types.js';
export * from './errors.js';
export * from './adapter.js';
export * from './factory.js';
export * from './retry.js';
export { GeminiAdapter, AnthropicAdapter } from './adapters/index.js';
