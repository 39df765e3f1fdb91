/**
 * Provider factory: builds the configured LanguageModelProvider
 */

import { createValidationError } from '../../core/errors.js';
import type { Config } from '../../config/index.js';
import { AnthropicProvider } from './anthropic.provider.js';
import { OllamaProvider } from './ollama.provider.js';
import { OpenAIProvider } from './openai.provider.js';
import { DEFAULT_MODELS, assertValidModelName } from './models.js';
import type { LanguageModelProvider } from './types.js';

export function createLanguageModelProvider(llm: Config['llm']): LanguageModelProvider {
  switch (llm.provider) {
    case 'openai':
      if (!llm.openaiApiKey) {
        throw createValidationError(
          'openaiApiKey',
          'is required when provider is "openai"',
          'Set OPENAI_API_KEY or choose another MEETING_NOTES_LLM_PROVIDER'
        );
      }
      return new OpenAIProvider({
        apiKey: llm.openaiApiKey,
        baseUrl: llm.openaiBaseUrl,
        timeoutMs: llm.timeoutMs,
      });

    case 'anthropic':
      if (!llm.anthropicApiKey) {
        throw createValidationError(
          'anthropicApiKey',
          'is required when provider is "anthropic"',
          'Set ANTHROPIC_API_KEY or choose another MEETING_NOTES_LLM_PROVIDER'
        );
      }
      return new AnthropicProvider({ apiKey: llm.anthropicApiKey, timeoutMs: llm.timeoutMs });

    case 'ollama':
      return new OllamaProvider({ baseUrl: llm.ollamaBaseUrl, timeoutMs: llm.timeoutMs });
  }
}

/**
 * Configured model, or the provider's default
 */
export function resolveModel(llm: Pick<Config['llm'], 'provider' | 'model'>): string {
  const model = llm.model ?? DEFAULT_MODELS[llm.provider];
  assertValidModelName(model);
  return model;
}
