/**
 * Chunk Summarizer
 *
 * One model call per text unit: the whole transcription with the structured
 * four-section prompt, or a single chunk with the per-chunk prompt.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { SummarizationFailure, type SummarizationStage } from '../../core/errors.js';
import type { ChatMessage, LanguageModelProvider } from '../llm/types.js';
import { buildChunkSummaryPrompt, buildSummaryPrompt } from './prompts.js';
import type { CallSite, ResolvedSummarizationConfig } from './types.js';

const logger = createComponentLogger('chunk-summarizer');

export class ChunkSummarizer {
  constructor(
    private readonly provider: LanguageModelProvider,
    private readonly settings: ResolvedSummarizationConfig
  ) {}

  /**
   * Structured summary of a transcription that fits one call
   */
  async summarizeWhole(text: string): Promise<string> {
    return this.run(buildSummaryPrompt(text), 'summary', 'single-pass');
  }

  /**
   * Summary of part `ordinal` of `total`
   */
  async summarizeChunk(text: string, ordinal: number, total: number): Promise<string> {
    return this.run(buildChunkSummaryPrompt(text, ordinal, total), 'chunk', 'chunk', ordinal);
  }

  private async run(
    messages: ChatMessage[],
    site: CallSite,
    stage: SummarizationStage,
    chunkIndex?: number
  ): Promise<string> {
    const startTime = Date.now();

    try {
      const summary = await this.provider.generate(messages, {
        model: this.settings.model,
        temperature: this.settings.temperatures[site],
        maxOutputTokens: this.settings.maxOutputTokens[site],
      });

      logger.debug(
        { stage, chunkIndex, durationMs: Date.now() - startTime, summaryLength: summary.length },
        'Summary generated'
      );
      return summary;
    } catch (error) {
      throw new SummarizationFailure(stage, error, chunkIndex);
    }
  }
}
