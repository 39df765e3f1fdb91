/**
 * Centralized configuration module
 *
 * Configuration is built from the registry at src/config/registry/ when this
 * module is first imported; the CLI loads .env before that happens.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Add it to the matching object in configSchema below
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.summarization.chunkBudget);
 */

import { z } from 'zod';
import {
  configRegistry,
  buildConfigFromRegistry,
  validateConfig,
  loggingSection,
  runtimeSection,
  llmSection,
  summarizationSection,
  transcriptionSection,
} from './registry/index.js';

// =============================================================================
// CONFIG SCHEMA (one entry per registry option)
// =============================================================================

const { options: logging } = loggingSection;
const { options: runtime } = runtimeSection;
const { options: llm } = llmSection;
const { options: summarization } = summarizationSection;
const { options: transcription } = transcriptionSection;

export const configSchema = z.object({
  logging: z.object({
    level: logging.level.schema,
    pretty: logging.pretty.schema,
  }),
  runtime: z.object({
    nodeEnv: runtime.nodeEnv.schema,
  }),
  llm: z.object({
    provider: llm.provider.schema,
    model: llm.model.schema,
    openaiApiKey: llm.openaiApiKey.schema,
    openaiBaseUrl: llm.openaiBaseUrl.schema,
    anthropicApiKey: llm.anthropicApiKey.schema,
    ollamaBaseUrl: llm.ollamaBaseUrl.schema,
    timeoutMs: llm.timeoutMs.schema,
  }),
  summarization: z.object({
    chunkBudget: summarization.chunkBudget.schema,
    summaryTemperature: summarization.summaryTemperature.schema,
    summaryMaxTokens: summarization.summaryMaxTokens.schema,
    chunkTemperature: summarization.chunkTemperature.schema,
    chunkMaxTokens: summarization.chunkMaxTokens.schema,
    combineTemperature: summarization.combineTemperature.schema,
    combineMaxTokens: summarization.combineMaxTokens.schema,
    actionItemsTemperature: summarization.actionItemsTemperature.schema,
    actionItemsMaxTokens: summarization.actionItemsMaxTokens.schema,
  }),
  transcription: z.object({
    assemblyaiApiKey: transcription.assemblyaiApiKey.schema,
    assemblyaiBaseUrl: transcription.assemblyaiBaseUrl.schema,
    timeoutMs: transcription.timeoutMs.schema,
    maxAudioBytes: transcription.maxAudioBytes.schema,
  }),
});

export type Config = z.infer<typeof configSchema>;

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

/**
 * Build configuration from registry metadata and validate it.
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return validateConfig(buildConfigFromRegistry(configRegistry, env), configSchema);
}

export const config: Config = buildConfig();
