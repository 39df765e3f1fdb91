/**
 * Language model providers
 */

export { OpenAIProvider } from './openai.provider.js';
export { AnthropicProvider } from './anthropic.provider.js';
export { OllamaProvider } from './ollama.provider.js';
export { createLanguageModelProvider, resolveModel } from './factory.js';
export {
  DEFAULT_CHUNK_BUDGET,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_MODELS,
  getContextWindow,
  isValidModelName,
  resolveChunkBudget,
} from './models.js';
export type {
  ChatMessage,
  GenerateOptions,
  LanguageModelProvider,
  LLMProviderName,
  MessageRole,
} from './types.js';
