/**
 * Prompt rendering for metadata extraction
 */

import type { LLMMessage } from '../llm/index.js';
import {
  type PromptConfig,
  RESPONSE_FIELDS,
  TEXT_PLACEHOLDER,
} from './types.js';

export function truncateText(text: string, maxChars: number): string {
  const trimmed = text.trim();
  return trimmed.length > maxChars ? trimmed.slice(0, maxChars) : trimmed;
}

/**
 * System prompt followed by the expected JSON keys and their descriptions.
 */
export function renderSystemPrompt(prompt: PromptConfig): string {
  const lines = RESPONSE_FIELDS.map((field) => {
    const description = prompt.fields[field];
    return description ? `- ${field}: ${description}` : `- ${field}`;
  });

  return [
    prompt.system.trim(),
    '',
    'Return a JSON object with exactly these keys (use null when a value is not found):',
    ...lines,
  ].join('\n');
}

export function renderUserPrompt(prompt: PromptConfig, text: string): string {
  return prompt.user.split(TEXT_PLACEHOLDER).join(truncateText(text, prompt.maxInputChars));
}

export function buildExtractionMessages(prompt: PromptConfig, text: string): LLMMessage[] {
  return [
    { role: 'system', content: renderSystemPrompt(prompt) },
    { role: 'user', content: renderUserPrompt(prompt, text) },
  ];
}
