/**
 * Chunked Summarization Module
 *
 * Public exports for the transcript summarization pipeline.
 */

export {
  SummarizationService,
  createSummarizationService,
  resolveSummarizationConfig,
} from './summarization.service.js';
export type { SummarizationOverrides } from './summarization.service.js';

export { ChunkSummarizer } from './chunk-summarizer.js';
export { SummaryCombiner } from './summary-combiner.js';
export { ActionItemExtractor, parseActionItems, deduplicateActionItems } from './action-items.js';
export { chunkText, splitText, splitParagraphs, splitSentences } from './chunker.js';
export { estimateTokens, CHARS_PER_TOKEN } from './token-estimator.js';

export type {
  Chunk,
  ChunkSummary,
  SummaryResult,
  SummarizationStrategy,
  SummarizationConfig,
  ResolvedSummarizationConfig,
  CallSite,
  CallSiteValues,
} from './types.js';
export { DEFAULT_TEMPERATURES, DEFAULT_MAX_OUTPUT_TOKENS } from './types.js';
