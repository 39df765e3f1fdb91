/**
 * Anthropic messages provider
 */

import Anthropic from '@anthropic-ai/sdk';
import { createComponentLogger } from '../../utils/logger.js';
import { ProviderError, createProviderError } from '../../core/errors.js';
import type { ChatMessage, GenerateOptions, LanguageModelProvider } from './types.js';

const logger = createComponentLogger('anthropic-provider');

export interface AnthropicProviderOptions {
  apiKey: string;
  timeoutMs: number;
}

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Anthropic takes system instructions as a separate field
 */
export function splitSystemMessages(messages: readonly ChatMessage[]): {
  system: string | undefined;
  conversation: AnthropicMessage[];
} {
  const systemParts: string[] = [];
  const conversation: AnthropicMessage[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      conversation.push({ role: message.role, content: message.content });
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    conversation,
  };
}

export class AnthropicProvider implements LanguageModelProvider {
  readonly name = 'anthropic' as const;
  private client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(messages: readonly ChatMessage[], options: GenerateOptions): Promise<string> {
    const startTime = Date.now();
    const { system, conversation } = splitSystemMessages(messages);

    try {
      if (conversation.length === 0) {
        throw new ProviderError('at least one user message is required', 'anthropic', options.model);
      }

      const response = await this.client.messages.create({
        model: options.model,
        max_tokens: options.maxOutputTokens,
        // Anthropic accepts 0-1
        temperature: Math.min(1, options.temperature),
        ...(system ? { system } : {}),
        messages: conversation,
      });

      const textBlock = response.content.find((block) => block.type === 'text');
      if (!textBlock || textBlock.type !== 'text' || !textBlock.text.trim()) {
        throw new ProviderError('no text content returned', 'anthropic', options.model);
      }

      logger.debug(
        {
          model: options.model,
          tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
          processingTimeMs: Date.now() - startTime,
        },
        'Anthropic generation completed'
      );

      return textBlock.text.trim();
    } catch (error) {
      throw createProviderError('anthropic', options.model, error);
    }
  }
}
