import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CHUNK_BUDGET,
  getContextWindow,
  isValidModelName,
  resolveChunkBudget,
} from '../../src/services/llm/models.js';

describe('Model metadata', () => {
  describe('getContextWindow', () => {
    it.each([
      ['gpt-4o-mini', 128000],
      ['gpt-4-0613', 8192],
      ['gpt-4-turbo-preview', 128000],
      ['gpt-3.5-turbo', 16385],
      ['claude-3-5-haiku-20241022', 200000],
      ['llama3.2:3b', 128000],
      ['llama3:8b', 8192],
      ['some-local-model', 32768],
    ])('%s -> %i tokens', (model, tokens) => {
      expect(getContextWindow(model)).toBe(tokens);
    });
  });

  describe('resolveChunkBudget', () => {
    it('should cap the budget for large context windows', () => {
      expect(resolveChunkBudget('gpt-4o')).toBe(DEFAULT_CHUNK_BUDGET);
      expect(resolveChunkBudget('some-local-model')).toBe(12000);
    });

    it('should use half of a small context window', () => {
      expect(resolveChunkBudget('gpt-4')).toBe(4096);
      expect(resolveChunkBudget('gpt-3.5-turbo')).toBe(8192);
    });

    it('should prefer a positive override', () => {
      expect(resolveChunkBudget('gpt-4', 500)).toBe(500);
      expect(resolveChunkBudget('gpt-4', 0)).toBe(4096);
    });
  });

  describe('isValidModelName', () => {
    it('should accept provider model identifiers', () => {
      expect(isValidModelName('gpt-4o-mini')).toBe(true);
      expect(isValidModelName('llama3.2:3b')).toBe(true);
    });

    it('should reject names with spaces, slashes or excessive length', () => {
      expect(isValidModelName('gpt 4')).toBe(false);
      expect(isValidModelName('../admin')).toBe(false);
      expect(isValidModelName('a'.repeat(101))).toBe(false);
    });
  });
});
