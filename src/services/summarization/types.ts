/**
 * Summarization Types
 *
 * Value records for the chunked (map-reduce) summarization pipeline and the
 * configuration object the orchestrator is constructed with.
 */

import type { LLMProviderName } from '../llm/types.js';

// =============================================================================
// PIPELINE RECORDS
// =============================================================================

/**
 * A bounded, contiguous unit of transcript text
 */
export interface Chunk {
  /** 1-based ordinal */
  readonly index: number;
  /** Number of chunks the transcript was split into */
  readonly total: number;
  readonly content: string;
  readonly tokenEstimate: number;
}

/**
 * Summary of one chunk, tagged with the chunk's ordinal
 */
export interface ChunkSummary {
  readonly index: number;
  readonly content: string;
}

export type SummarizationStrategy = 'single-pass' | 'map-reduce';

export interface SummaryResult {
  /** Final summary text */
  summary: string;
  strategy: SummarizationStrategy;
  /** 1 for single-pass */
  chunkCount: number;
  model: string;
  provider: LLMProviderName;
  processingTimeMs: number;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * One value per prompt call site
 */
export interface CallSiteValues {
  /** Single-pass structured summary */
  summary: number;
  /** Per-chunk summary */
  chunk: number;
  /** Combining chunk summaries */
  combine: number;
  /** Action-item extraction (whole text and per chunk) */
  actionItems: number;
}

export type CallSite = keyof CallSiteValues;

/**
 * Summarization configuration
 */
export interface SummarizationConfig {
  /** Model identifier passed to the provider on every call */
  model: string;
  /** Estimated-token budget per call; derived from the model when absent */
  chunkBudget?: number;
  temperatures?: Partial<CallSiteValues>;
  maxOutputTokens?: Partial<CallSiteValues>;
}

export const DEFAULT_TEMPERATURES: CallSiteValues = {
  summary: 0.75,
  chunk: 0.7,
  combine: 0.7,
  actionItems: 0.6,
};

export const DEFAULT_MAX_OUTPUT_TOKENS: CallSiteValues = {
  summary: 1500,
  chunk: 1000,
  combine: 2000,
  actionItems: 750,
};

/**
 * SummarizationConfig with every default filled in
 */
export interface ResolvedSummarizationConfig {
  model: string;
  chunkBudget: number;
  temperatures: CallSiteValues;
  maxOutputTokens: CallSiteValues;
}
