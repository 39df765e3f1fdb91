import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { mockOpenAICreate, mockAnthropicCreate } = vi.hoisted(() => ({
  mockOpenAICreate: vi.fn(),
  mockAnthropicCreate: vi.fn(),
}));

vi.mock('openai', () => ({
  OpenAI: class {
    chat = { completions: { create: mockOpenAICreate } };
  },
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: mockAnthropicCreate };
  },
}));

import { OpenAIProvider } from '../../src/services/llm/openai.provider.js';
import {
  AnthropicProvider,
  splitSystemMessages,
} from '../../src/services/llm/anthropic.provider.js';
import { OllamaProvider, validateOllamaResponse } from '../../src/services/llm/ollama.provider.js';
import { createLanguageModelProvider, resolveModel } from '../../src/services/llm/factory.js';
import { buildConfig } from '../../src/config/index.js';
import { ProviderError } from '../../src/core/errors.js';
import type { ChatMessage } from '../../src/services/llm/types.js';

const messages: ChatMessage[] = [
  { role: 'system', content: 'Be brief.' },
  { role: 'user', content: 'Summarize this.' },
];

describe('OpenAIProvider', () => {
  beforeEach(() => {
    mockOpenAICreate.mockReset();
  });

  it('should send chat messages and return trimmed content', async () => {
    mockOpenAICreate.mockResolvedValue({
      choices: [{ message: { content: '  A summary.  ' } }],
      usage: { total_tokens: 42 },
    });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', timeoutMs: 1000 });

    const result = await provider.generate(messages, {
      model: 'gpt-4o-mini',
      temperature: 0.7,
      maxOutputTokens: 100,
    });

    expect(result).toBe('A summary.');
    expect(mockOpenAICreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Summarize this.' },
      ],
      temperature: 0.7,
      max_tokens: 100,
    });
  });

  it('should reject empty choices with a ProviderError', async () => {
    mockOpenAICreate.mockResolvedValue({ choices: [] });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', timeoutMs: 1000 });

    await expect(
      provider.generate(messages, { model: 'gpt-4o-mini', temperature: 0.7, maxOutputTokens: 100 })
    ).rejects.toThrow('openai request failed: empty choices array - model may have refused to respond');
  });

  it('should reject blank content with a ProviderError', async () => {
    mockOpenAICreate.mockResolvedValue({ choices: [{ message: { content: '   ' } }] });
    const provider = new OpenAIProvider({ apiKey: 'test-secret', timeoutMs: 1000 });

    await expect(
      provider.generate(messages, { model: 'gpt-4o-mini', temperature: 0.7, maxOutputTokens: 100 })
    ).rejects.toBeInstanceOf(ProviderError);
  });

  it('should wrap SDK errors and keep the cause', async () => {
    const sdkError = new Error('401 Incorrect API key provided');
    mockOpenAICreate.mockRejectedValue(sdkError);
    const provider = new OpenAIProvider({ apiKey: 'test-secret', timeoutMs: 1000 });

    const error = await provider
      .generate(messages, { model: 'gpt-4o-mini', temperature: 0.7, maxOutputTokens: 100 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (!(error instanceof ProviderError)) return;
    expect(error.message).toBe('openai request failed: 401 Incorrect API key provided');
    expect(error.provider).toBe('openai');
    expect(error.model).toBe('gpt-4o-mini');
    expect(error.cause).toBe(sdkError);
  });
});

describe('AnthropicProvider', () => {
  beforeEach(() => {
    mockAnthropicCreate.mockReset();
  });

  it('should move system messages to the system field and cap temperature', async () => {
    mockAnthropicCreate.mockResolvedValue({
      content: [{ type: 'text', text: ' A summary. ' }],
      usage: { input_tokens: 10, output_tokens: 5 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-secret', timeoutMs: 1000 });

    const result = await provider.generate(messages, {
      model: 'claude-3-5-haiku-20241022',
      temperature: 1.5,
      maxOutputTokens: 100,
    });

    expect(result).toBe('A summary.');
    expect(mockAnthropicCreate).toHaveBeenCalledWith({
      model: 'claude-3-5-haiku-20241022',
      max_tokens: 100,
      temperature: 1,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Summarize this.' }],
    });
  });

  it('should reject a response without text', async () => {
    mockAnthropicCreate.mockResolvedValue({
      content: [],
      usage: { input_tokens: 10, output_tokens: 0 },
    });
    const provider = new AnthropicProvider({ apiKey: 'test-secret', timeoutMs: 1000 });

    await expect(
      provider.generate(messages, {
        model: 'claude-3-5-haiku-20241022',
        temperature: 0.7,
        maxOutputTokens: 100,
      })
    ).rejects.toThrow('anthropic request failed: no text content returned');
  });

  it('should join several system messages', () => {
    expect(
      splitSystemMessages([
        { role: 'system', content: 'One.' },
        { role: 'system', content: 'Two.' },
        { role: 'user', content: 'Hi' },
      ])
    ).toEqual({ system: 'One.\n\nTwo.', conversation: [{ role: 'user', content: 'Hi' }] });
  });
});

describe('OllamaProvider', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post to /api/chat without streaming', async () => {
    fetchMock.mockResolvedValue(
      new Response(JSON.stringify({ message: { role: 'assistant', content: ' Local summary ' } }))
    );
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434/', timeoutMs: 1000 });

    const result = await provider.generate(messages, {
      model: 'llama3.2',
      temperature: 0.5,
      maxOutputTokens: 200,
    });

    expect(result).toBe('Local summary');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3.2',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Summarize this.' },
      ],
      stream: false,
      options: { temperature: 0.5, num_predict: 200 },
    });
  });

  it('should turn HTTP errors into a ProviderError', async () => {
    fetchMock.mockResolvedValue(
      new Response('boom', { status: 500, statusText: 'Internal Server Error' })
    );
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434', timeoutMs: 1000 });

    await expect(
      provider.generate(messages, { model: 'llama3.2', temperature: 0.5, maxOutputTokens: 200 })
    ).rejects.toThrow('ollama request failed: Ollama request failed: 500 Internal Server Error');
  });

  it('should reject non-http base URLs', () => {
    expect(() => new OllamaProvider({ baseUrl: 'file:///tmp/socket', timeoutMs: 1000 })).toThrow(
      /Invalid protocol: file:/
    );
  });

  describe('validateOllamaResponse', () => {
    it('should surface API errors', () => {
      expect(() => validateOllamaResponse({ error: 'model not found' }, 'llama3.2')).toThrow(
        'ollama request failed: API error: model not found'
      );
    });

    it('should reject responses without message content', () => {
      expect(() => validateOllamaResponse({ done: true }, 'llama3.2')).toThrow(
        'ollama request failed: no valid message in response'
      );
      expect(() => validateOllamaResponse('text', 'llama3.2')).toThrow(/response is not an object/);
    });
  });
});

describe('createLanguageModelProvider', () => {
  it('should require an OpenAI key for the openai provider', () => {
    expect(() => createLanguageModelProvider(buildConfig({}).llm)).toThrow(/openaiApiKey/);
  });

  it('should require an Anthropic key for the anthropic provider', () => {
    const { llm } = buildConfig({ MEETING_NOTES_LLM_PROVIDER: 'anthropic' });
    expect(() => createLanguageModelProvider(llm)).toThrow(/anthropicApiKey/);
  });

  it('should build the configured provider', () => {
    expect(createLanguageModelProvider(buildConfig({ OPENAI_API_KEY: 'test-secret' }).llm)).toBeInstanceOf(
      OpenAIProvider
    );
    expect(
      createLanguageModelProvider(buildConfig({ ANTHROPIC_API_KEY: 'test-secret' }).llm)
    ).toBeInstanceOf(AnthropicProvider);
    expect(
      createLanguageModelProvider(buildConfig({ MEETING_NOTES_LLM_PROVIDER: 'ollama' }).llm).name
    ).toBe('ollama');
  });

  it('should fall back to the provider default model', () => {
    expect(resolveModel({ provider: 'anthropic', model: undefined })).toBe(
      'claude-3-5-haiku-20241022'
    );
    expect(resolveModel({ provider: 'ollama', model: 'mistral:7b' })).toBe('mistral:7b');
    expect(() => resolveModel({ provider: 'openai', model: 'bad model' })).toThrow(
      /invalid model name/
    );
  });
});
