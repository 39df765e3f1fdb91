/**
 * Common types for language model providers
 */

export type LLMProviderName = 'openai' | 'anthropic' | 'ollama';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Per-call generation settings
 */
export interface GenerateOptions {
  /** Provider model identifier */
  model: string;
  /** Sampling temperature (0-2) */
  temperature: number;
  /** Upper bound on generated tokens */
  maxOutputTokens: number;
}

/**
 * Narrow capability the summarization pipeline depends on.
 *
 * Implementations reject with a ProviderError on any failure
 * (timeout, auth, rate limit, malformed or empty response).
 */
export interface LanguageModelProvider {
  readonly name: LLMProviderName;

  generate(messages: readonly ChatMessage[], options: GenerateOptions): Promise<string>;
}
