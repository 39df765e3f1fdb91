/**
 * Action-Item Extractor + Deduplicator
 *
 * Same decide/split/merge shape as summarization: one extraction call when
 * the transcription fits the budget, otherwise one call per chunk, with the
 * results merged and deduplicated in encounter order.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { ActionItemExtractionFailure } from '../../core/errors.js';
import type { ChatMessage, LanguageModelProvider } from '../llm/types.js';
import { chunkText } from './chunker.js';
import { buildActionItemsPrompt, buildChunkActionItemsPrompt } from './prompts.js';
import { estimateTokens } from './token-estimator.js';
import type { ResolvedSummarizationConfig } from './types.js';

const logger = createComponentLogger('action-items');

const BULLET_LINE = /^[-•]/;
const LEADING_BULLETS = /^[-•\s]+/;

/**
 * Keep only bullet lines of a model response, without their markers.
 */
export function parseActionItems(response: string): string[] {
  return response
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => BULLET_LINE.test(line))
    .map((line) => line.replace(LEADING_BULLETS, '').trim())
    .filter((item) => item.length > 0);
}

/**
 * Case-insensitive exact dedup. The first occurrence (and its casing) wins.
 */
export function deduplicateActionItems(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const item of items) {
    const key = item.trim().toLowerCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(item);
  }

  return unique;
}

export class ActionItemExtractor {
  constructor(
    private readonly provider: LanguageModelProvider,
    private readonly settings: ResolvedSummarizationConfig
  ) {}

  /**
   * Extract deduplicated action items from a transcription.
   *
   * On the whole-text path a failed call is logged and yields `[]`.
   * On the chunked path a failed chunk rejects with ActionItemExtractionFailure.
   */
  async extract(text: string): Promise<string[]> {
    if (estimateTokens(text) <= this.settings.chunkBudget) {
      try {
        return deduplicateActionItems(await this.request(buildActionItemsPrompt(text)));
      } catch (error) {
        logger.warn(
          { error: error instanceof Error ? error.message : String(error) },
          'Action item extraction failed, returning no items'
        );
        return [];
      }
    }

    const chunks = chunkText(text, this.settings.chunkBudget);
    logger.debug({ chunkCount: chunks.length }, 'Extracting action items per chunk');

    const items: string[] = [];
    for (const chunk of chunks) {
      try {
        items.push(
          ...(await this.request(buildChunkActionItemsPrompt(chunk.content, chunk.index, chunk.total)))
        );
      } catch (error) {
        throw new ActionItemExtractionFailure(error, chunk.index);
      }
    }

    return deduplicateActionItems(items);
  }

  private async request(messages: ChatMessage[]): Promise<string[]> {
    const response = await this.provider.generate(messages, {
      model: this.settings.model,
      temperature: this.settings.temperatures.actionItems,
      maxOutputTokens: this.settings.maxOutputTokens.actionItems,
    });
    return parseActionItems(response);
  }
}
