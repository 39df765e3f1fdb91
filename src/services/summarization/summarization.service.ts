/**
 * Summarization Service
 *
 * Entry point of the chunked summarization pipeline. A transcription that
 * fits the chunk budget is summarized in one structured call; a larger one
 * is chunked, each chunk summarized in order, and the chunk summaries
 * combined into one final summary (map-reduce over text).
 */

import { createComponentLogger } from '../../utils/logger.js';
import { createValidationError } from '../../core/errors.js';
import type { Config } from '../../config/index.js';
import { createLanguageModelProvider, resolveModel } from '../llm/factory.js';
import { assertValidModelName, resolveChunkBudget } from '../llm/models.js';
import type { LanguageModelProvider } from '../llm/types.js';
import { ActionItemExtractor } from './action-items.js';
import { ChunkSummarizer } from './chunk-summarizer.js';
import { chunkText } from './chunker.js';
import { SummaryCombiner } from './summary-combiner.js';
import { estimateTokens } from './token-estimator.js';
import type {
  ChunkSummary,
  ResolvedSummarizationConfig,
  SummarizationConfig,
  SummaryResult,
} from './types.js';
import { DEFAULT_MAX_OUTPUT_TOKENS, DEFAULT_TEMPERATURES } from './types.js';

const logger = createComponentLogger('summarization');

/**
 * Fill in defaults and validate a SummarizationConfig
 */
export function resolveSummarizationConfig(config: SummarizationConfig): ResolvedSummarizationConfig {
  assertValidModelName(config.model);

  if (config.chunkBudget !== undefined && (!Number.isInteger(config.chunkBudget) || config.chunkBudget <= 0)) {
    throw createValidationError(
      'chunkBudget',
      `must be a positive integer (got ${config.chunkBudget})`,
      'Omit it to derive the budget from the model context window'
    );
  }

  return {
    model: config.model,
    chunkBudget: resolveChunkBudget(config.model, config.chunkBudget),
    temperatures: { ...DEFAULT_TEMPERATURES, ...config.temperatures },
    maxOutputTokens: { ...DEFAULT_MAX_OUTPUT_TOKENS, ...config.maxOutputTokens },
  };
}

export class SummarizationService {
  private readonly settings: ResolvedSummarizationConfig;
  private readonly summarizer: ChunkSummarizer;
  private readonly combiner: SummaryCombiner;
  private readonly actionItems: ActionItemExtractor;

  constructor(
    private readonly provider: LanguageModelProvider,
    config: SummarizationConfig
  ) {
    this.settings = resolveSummarizationConfig(config);
    this.summarizer = new ChunkSummarizer(provider, this.settings);
    this.combiner = new SummaryCombiner(provider, this.settings);
    this.actionItems = new ActionItemExtractor(provider, this.settings);

    logger.debug(
      { provider: provider.name, model: this.settings.model, chunkBudget: this.settings.chunkBudget },
      'Summarization service initialized'
    );
  }

  get chunkBudget(): number {
    return this.settings.chunkBudget;
  }

  get model(): string {
    return this.settings.model;
  }

  /**
   * Final summary of a transcription
   */
  async summarize(text: string): Promise<string> {
    const result = await this.summarizeDetailed(text);
    return result.summary;
  }

  /**
   * Final summary plus the path taken and timing
   */
  async summarizeDetailed(text: string): Promise<SummaryResult> {
    const startTime = Date.now();
    const tokenEstimate = estimateTokens(text);
    const base = { model: this.settings.model, provider: this.provider.name };

    if (tokenEstimate <= this.settings.chunkBudget) {
      logger.debug({ tokenEstimate }, 'Summarizing in a single pass');
      const summary = await this.summarizer.summarizeWhole(text);
      return {
        ...base,
        summary,
        strategy: 'single-pass',
        chunkCount: 1,
        processingTimeMs: Date.now() - startTime,
      };
    }

    const chunks = chunkText(text, this.settings.chunkBudget);
    logger.info(
      { tokenEstimate, chunkBudget: this.settings.chunkBudget, chunkCount: chunks.length },
      'Transcription exceeds chunk budget, summarizing in chunks'
    );

    try {
      const summaries: ChunkSummary[] = [];
      for (const chunk of chunks) {
        const content = await this.summarizer.summarizeChunk(chunk.content, chunk.index, chunk.total);
        summaries.push(Object.freeze({ index: chunk.index, content }));
      }

      const summary = await this.combiner.combine(summaries);
      const processingTimeMs = Date.now() - startTime;

      logger.info({ chunkCount: chunks.length, processingTimeMs }, 'Chunked summary complete');
      return {
        ...base,
        summary,
        strategy: 'map-reduce',
        chunkCount: chunks.length,
        processingTimeMs,
      };
    } catch (error) {
      logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Chunked summarization aborted'
      );
      throw error;
    }
  }

  /**
   * Deduplicated action items of a transcription
   */
  async extractActionItems(text: string): Promise<string[]> {
    return this.actionItems.extract(text);
  }
}

/**
 * Optional per-invocation overrides on top of the environment config
 */
export interface SummarizationOverrides {
  model?: string;
  chunkBudget?: number;
}

/**
 * Build a SummarizationService from the application config.
 */
export function createSummarizationService(
  appConfig: Pick<Config, 'llm' | 'summarization'>,
  overrides: SummarizationOverrides = {},
  provider: LanguageModelProvider = createLanguageModelProvider(appConfig.llm)
): SummarizationService {
  const s = appConfig.summarization;
  const configuredBudget = s.chunkBudget > 0 ? s.chunkBudget : undefined;

  return new SummarizationService(provider, {
    model: overrides.model ?? resolveModel(appConfig.llm),
    chunkBudget: overrides.chunkBudget ?? configuredBudget,
    temperatures: {
      summary: s.summaryTemperature,
      chunk: s.chunkTemperature,
      combine: s.combineTemperature,
      actionItems: s.actionItemsTemperature,
    },
    maxOutputTokens: {
      summary: s.summaryMaxTokens,
      chunk: s.chunkMaxTokens,
      combine: s.combineMaxTokens,
      actionItems: s.actionItemsMaxTokens,
    },
  });
}
