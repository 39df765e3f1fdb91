/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';

import { loggingSection } from './sections/logging.js';
import { runtimeSection } from './sections/runtime.js';
import { llmSection } from './sections/llm.js';
import { summarizationSection } from './sections/summarization.js';
import { transcriptionSection } from './sections/transcription.js';

export const configRegistry = {
  sections: {
    logging: loggingSection,
    runtime: runtimeSection,
    llm: llmSection,
    summarization: summarizationSection,
    transcription: transcriptionSection,
  },
} satisfies ConfigRegistry;

export { loggingSection, runtimeSection, llmSection, summarizationSection, transcriptionSection };
export { buildConfigFromRegistry, validateConfig, formatZodErrors, getAllEnvVars } from './schema-builder.js';
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
