/**
 * Transcript chunker
 *
 * Splits a transcription into ordered chunks that each fit an estimated-token
 * budget, preferring paragraph boundaries and falling back to sentence
 * boundaries for oversized paragraphs. Every non-whitespace character of the
 * input ends up in exactly one chunk.
 */

import { createValidationError } from '../../core/errors.js';
import { estimateTokens } from './token-estimator.js';
import type { Chunk } from './types.js';

export const PARAGRAPH_SEPARATOR = '\n\n';
export const SENTENCE_SEPARATOR = ' ';

const PARAGRAPH_BOUNDARY = /\n\s*\n/;
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/**
 * Greedy accumulator shared by the paragraph and sentence passes.
 * Units are appended to the running buffer while the estimate stays within
 * budget; otherwise the buffer is flushed and the unit starts a new one.
 */
class ChunkAccumulator {
  private readonly completed: string[] = [];
  private buffer = '';

  constructor(private readonly maxTokens: number) {}

  add(unit: string, separator: string): void {
    if (!this.buffer) {
      this.buffer = unit;
      return;
    }

    const candidate = this.buffer + separator + unit;
    if (estimateTokens(candidate) <= this.maxTokens) {
      this.buffer = candidate;
    } else {
      this.flush();
      this.buffer = unit;
    }
  }

  flush(): void {
    if (this.buffer) {
      this.completed.push(this.buffer);
      this.buffer = '';
    }
  }

  finish(): string[] {
    this.flush();
    return this.completed;
  }
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(PARAGRAPH_BOUNDARY)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

export function splitSentences(paragraph: string): string[] {
  return paragraph
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/**
 * Split `text` into chunk contents of at most `maxTokens` estimated tokens.
 *
 * A sentence that alone exceeds the budget is kept whole, so such a chunk may
 * run over. Always returns at least one element.
 */
export function splitText(text: string, maxTokens: number): string[] {
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw createValidationError('maxTokens', `must be a positive integer (got ${maxTokens})`);
  }

  if (estimateTokens(text) <= maxTokens) {
    return [text];
  }

  const accumulator = new ChunkAccumulator(maxTokens);

  for (const paragraph of splitParagraphs(text)) {
    if (estimateTokens(paragraph) <= maxTokens) {
      accumulator.add(paragraph, PARAGRAPH_SEPARATOR);
      continue;
    }

    // Oversized paragraph: sentences start from an empty buffer
    accumulator.flush();
    for (const sentence of splitSentences(paragraph)) {
      accumulator.add(sentence, SENTENCE_SEPARATOR);
    }
  }

  const contents = accumulator.finish();
  return contents.length > 0 ? contents : [text];
}

/**
 * Chunk a transcription into ordinal-tagged, immutable chunks.
 */
export function chunkText(text: string, maxTokens: number): readonly Chunk[] {
  const contents = splitText(text, maxTokens);

  return contents.map(
    (content, i): Chunk =>
      Object.freeze({
        index: i + 1,
        total: contents.length,
        content,
        tokenEstimate: estimateTokens(content),
      })
  );
}
