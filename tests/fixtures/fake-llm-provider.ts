/**
 * In-process LanguageModelProvider for unit tests.
 *
 * Records every call and replays scripted responses in order. A scripted
 * Error is thrown instead of returned; once the script is exhausted the
 * fallback response is used.
 */

import type {
  ChatMessage,
  GenerateOptions,
  LanguageModelProvider,
  LLMProviderName,
} from '../../src/services/llm/types.js';

export type FakeResponse = string | Error | ((messages: readonly ChatMessage[]) => string);

export interface RecordedCall {
  messages: ChatMessage[];
  options: GenerateOptions;
}

export class FakeLanguageModelProvider implements LanguageModelProvider {
  readonly calls: RecordedCall[] = [];
  private readonly script: FakeResponse[];

  constructor(
    responses: FakeResponse[] = [],
    private readonly fallback: FakeResponse = 'fake response',
    readonly name: LLMProviderName = 'openai'
  ) {
    this.script = [...responses];
  }

  async generate(messages: readonly ChatMessage[], options: GenerateOptions): Promise<string> {
    this.calls.push({ messages: [...messages], options });

    const next = this.script.shift() ?? this.fallback;
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next(messages) : next;
  }

  /** Content of the user message of call `n` (0-based) */
  userPrompt(n: number): string {
    return this.calls[n]?.messages.find((m) => m.role === 'user')?.content ?? '';
  }

  /** Content of the system message of call `n` (0-based) */
  systemPrompt(n: number): string {
    return this.calls[n]?.messages.find((m) => m.role === 'system')?.content ?? '';
  }
}
