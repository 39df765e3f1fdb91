/**
 * Summary Combiner
 *
 * Merges ordered chunk summaries into one final summary with a single
 * model call. A lone summary is returned as is.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { SummarizationFailure, createValidationError } from '../../core/errors.js';
import type { LanguageModelProvider } from '../llm/types.js';
import { buildCombinePrompt } from './prompts.js';
import type { ChunkSummary, ResolvedSummarizationConfig } from './types.js';

const logger = createComponentLogger('summary-combiner');

export class SummaryCombiner {
  constructor(
    private readonly provider: LanguageModelProvider,
    private readonly settings: ResolvedSummarizationConfig
  ) {}

  async combine(summaries: readonly ChunkSummary[]): Promise<string> {
    if (summaries.length === 0) {
      throw createValidationError('summaries', 'at least one chunk summary is required');
    }

    if (summaries.length === 1) {
      return summaries[0].content;
    }

    const ordered = [...summaries].sort((a, b) => a.index - b.index);

    logger.debug({ sectionCount: ordered.length }, 'Combining chunk summaries');

    try {
      return await this.provider.generate(buildCombinePrompt(ordered), {
        model: this.settings.model,
        temperature: this.settings.temperatures.combine,
        maxOutputTokens: this.settings.maxOutputTokens.combine,
      });
    } catch (error) {
      throw new SummarizationFailure('combine', error);
    }
  }
}
