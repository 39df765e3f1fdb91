/**
 * Language Model Configuration Section
 *
 * Provider selection, credentials and model choice for summarization.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';
import { LLM_PROVIDERS, detectLlmProvider } from '../parsers.js';

export const llmSection = {
  name: 'llm',
  description: 'Language model provider configuration.',
  options: {
    provider: {
      envKey: 'MEETING_NOTES_LLM_PROVIDER',
      defaultValue: 'openai',
      description: 'LLM provider: openai, anthropic, or ollama. Auto-detected from API keys when unset.',
      schema: z.enum(LLM_PROVIDERS),
      parse: (value, _defaultValue, env) => detectLlmProvider(value, env),
    },
    model: {
      envKey: 'MEETING_NOTES_MODEL',
      defaultValue: undefined,
      description: 'Model identifier. Falls back to OPENAI_MODEL, then to the provider default.',
      schema: z.string().optional(),
      parse: (value, _defaultValue, env) => value || env.OPENAI_MODEL || undefined,
    },
    openaiApiKey: {
      envKey: 'OPENAI_API_KEY',
      defaultValue: undefined,
      description: 'OpenAI API key.',
      schema: z.string().optional(),
      sensitive: true,
    },
    openaiBaseUrl: {
      envKey: 'MEETING_NOTES_OPENAI_BASE_URL',
      defaultValue: undefined,
      description: 'Custom OpenAI-compatible API base URL.',
      schema: z.string().url().optional(),
    },
    anthropicApiKey: {
      envKey: 'ANTHROPIC_API_KEY',
      defaultValue: undefined,
      description: 'Anthropic API key.',
      schema: z.string().optional(),
      sensitive: true,
    },
    ollamaBaseUrl: {
      envKey: 'MEETING_NOTES_OLLAMA_BASE_URL',
      defaultValue: 'http://localhost:11434',
      description: 'Ollama API base URL.',
      schema: z.string().url(),
    },
    timeoutMs: {
      envKey: 'MEETING_NOTES_LLM_TIMEOUT_MS',
      defaultValue: 120000,
      description: 'Timeout for a single model call in milliseconds.',
      schema: z.number().int().min(1000),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
