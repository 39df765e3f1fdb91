/**
 * Summarization Configuration Section
 *
 * Chunk budget plus temperature and output size for each prompt.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

const temperature = z.number().min(0).max(2);
const maxTokens = z.number().int().min(1);

export const summarizationSection = {
  name: 'summarization',
  description: 'Chunked summarization settings.',
  options: {
    chunkBudget: {
      envKey: 'MEETING_NOTES_CHUNK_BUDGET',
      defaultValue: 0,
      description: 'Estimated-token budget per model call. 0 derives it from the model context window.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    summaryTemperature: {
      envKey: 'MEETING_NOTES_SUMMARY_TEMPERATURE',
      defaultValue: 0.75,
      description: 'Temperature for the single-pass structured summary.',
      schema: temperature,
    },
    summaryMaxTokens: {
      envKey: 'MEETING_NOTES_SUMMARY_MAX_TOKENS',
      defaultValue: 1500,
      description: 'Maximum output tokens for the single-pass structured summary.',
      schema: maxTokens,
      parse: 'int',
    },
    chunkTemperature: {
      envKey: 'MEETING_NOTES_CHUNK_TEMPERATURE',
      defaultValue: 0.7,
      description: 'Temperature for per-chunk summaries.',
      schema: temperature,
    },
    chunkMaxTokens: {
      envKey: 'MEETING_NOTES_CHUNK_MAX_TOKENS',
      defaultValue: 1000,
      description: 'Maximum output tokens for per-chunk summaries.',
      schema: maxTokens,
      parse: 'int',
    },
    combineTemperature: {
      envKey: 'MEETING_NOTES_COMBINE_TEMPERATURE',
      defaultValue: 0.7,
      description: 'Temperature for combining chunk summaries.',
      schema: temperature,
    },
    combineMaxTokens: {
      envKey: 'MEETING_NOTES_COMBINE_MAX_TOKENS',
      defaultValue: 2000,
      description: 'Maximum output tokens for the combined summary.',
      schema: maxTokens,
      parse: 'int',
    },
    actionItemsTemperature: {
      envKey: 'MEETING_NOTES_ACTION_ITEMS_TEMPERATURE',
      defaultValue: 0.6,
      description: 'Temperature for action-item extraction.',
      schema: temperature,
    },
    actionItemsMaxTokens: {
      envKey: 'MEETING_NOTES_ACTION_ITEMS_MAX_TOKENS',
      defaultValue: 750,
      description: 'Maximum output tokens for action-item extraction.',
      schema: maxTokens,
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
