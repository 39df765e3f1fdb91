/**
 * Ollama provider for local models (REST /api/chat)
 */

import { createComponentLogger } from '../../utils/logger.js';
import { ProviderError, createProviderError, createValidationError } from '../../core/errors.js';
import { fetchWithTimeout, parseJsonResponse } from '../../utils/http.js';
import type { ChatMessage, GenerateOptions, LanguageModelProvider } from './types.js';

const logger = createComponentLogger('ollama-provider');

export interface OllamaProviderOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Validate Ollama response structure and extract the generated text
 */
export function validateOllamaResponse(data: unknown, model: string): string {
  if (typeof data !== 'object' || data === null) {
    throw new ProviderError('response is not an object', 'ollama', model);
  }

  if ('error' in data && typeof data.error === 'string' && data.error) {
    throw new ProviderError(`API error: ${data.error}`, 'ollama', model);
  }

  const message = 'message' in data ? data.message : undefined;
  const content =
    typeof message === 'object' && message !== null && 'content' in message
      ? message.content
      : undefined;

  if (typeof content !== 'string' || content.trim().length === 0) {
    logger.warn({ hasMessage: 'message' in data }, 'Ollama response missing message content');
    throw new ProviderError('no valid message in response', 'ollama', model);
  }

  return content.trim();
}

export class OllamaProvider implements LanguageModelProvider {
  readonly name = 'ollama' as const;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: OllamaProviderOptions) {
    const url = new URL(options.baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw createValidationError(
        'ollamaBaseUrl',
        `Invalid protocol: ${url.protocol}. Only http/https allowed`
      );
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  async generate(messages: readonly ChatMessage[], options: GenerateOptions): Promise<string> {
    const startTime = Date.now();

    try {
      const responseText = await fetchWithTimeout(
        `${this.baseUrl}/api/chat`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model: options.model,
            messages: messages.map((m) => ({ role: m.role, content: m.content })),
            stream: false,
            options: {
              temperature: options.temperature,
              num_predict: options.maxOutputTokens,
            },
          }),
        },
        { service: 'Ollama', timeoutMs: this.timeoutMs }
      );

      const content = validateOllamaResponse(
        parseJsonResponse('Ollama', responseText),
        options.model
      );

      logger.debug(
        { model: options.model, processingTimeMs: Date.now() - startTime },
        'Ollama generation completed'
      );

      return content;
    } catch (error) {
      throw createProviderError('ollama', options.model, error);
    }
  }
}
