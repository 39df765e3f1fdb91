/**
 * OpenAI chat-completions provider
 */

import { OpenAI } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { createComponentLogger } from '../../utils/logger.js';
import { ProviderError, createProviderError } from '../../core/errors.js';
import type { ChatMessage, GenerateOptions, LanguageModelProvider } from './types.js';

const logger = createComponentLogger('openai-provider');

export interface OpenAIProviderOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAIProvider implements LanguageModelProvider {
  readonly name = 'openai' as const;
  private client: OpenAI;

  constructor(options: OpenAIProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl || undefined,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async generate(messages: readonly ChatMessage[], options: GenerateOptions): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: options.model,
        messages: messages.map(toOpenAIMessage),
        temperature: options.temperature,
        max_tokens: options.maxOutputTokens,
      });

      if (!response.choices || response.choices.length === 0) {
        throw new ProviderError(
          'empty choices array - model may have refused to respond',
          'openai',
          options.model
        );
      }
      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ProviderError('no content in message', 'openai', options.model);
      }

      logger.debug(
        {
          model: options.model,
          tokensUsed: response.usage?.total_tokens,
          processingTimeMs: Date.now() - startTime,
        },
        'OpenAI generation completed'
      );

      return content;
    } catch (error) {
      throw createProviderError('openai', options.model, error);
    }
  }
}
