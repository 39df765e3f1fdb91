/**
 * Model metadata: default models per provider and context-window budgets
 */

import { createValidationError } from '../../core/errors.js';
import type { LLMProviderName } from './types.js';

/** Upper bound for the estimated-token budget of a single model call */
export const DEFAULT_CHUNK_BUDGET = 12000;

/** Context window assumed for models missing from the table */
export const DEFAULT_CONTEXT_WINDOW = 32768;

export const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-20241022',
  ollama: 'llama3.2',
};

/**
 * Context windows (tokens) keyed by model-name prefix. Longest prefix wins.
 */
const CONTEXT_WINDOWS: ReadonlyArray<readonly [prefix: string, tokens: number]> = [
  ['gpt-4o', 128000],
  ['gpt-4.1', 1047576],
  ['gpt-4-turbo', 128000],
  ['gpt-4', 8192],
  ['gpt-3.5-turbo', 16385],
  ['o1', 200000],
  ['o3', 200000],
  ['claude-', 200000],
  ['llama3.1', 128000],
  ['llama3.2', 128000],
  ['llama3', 8192],
  ['mistral', 32768],
];

/**
 * Validate model name to prevent injection into request paths and payloads
 */
export function isValidModelName(modelName: string): boolean {
  const validPattern = /^[a-zA-Z0-9._:-]+$/;
  return validPattern.test(modelName) && modelName.length <= 100;
}

export function assertValidModelName(modelName: string): void {
  if (!isValidModelName(modelName)) {
    throw createValidationError(
      'model',
      `invalid model name "${modelName}"`,
      'Model names must only contain alphanumeric characters, hyphens, underscores, colons, and dots'
    );
  }
}

export function getContextWindow(model: string): number {
  let best: readonly [string, number] | undefined;
  for (const entry of CONTEXT_WINDOWS) {
    if (model.startsWith(entry[0]) && (!best || entry[0].length > best[0].length)) {
      best = entry;
    }
  }
  return best ? best[1] : DEFAULT_CONTEXT_WINDOW;
}

/**
 * Estimated-token budget for one model call.
 *
 * A positive override wins. Otherwise half the model's context window,
 * capped at DEFAULT_CHUNK_BUDGET; the other half is left for the prompt
 * scaffolding and the generated output.
 */
export function resolveChunkBudget(model: string, override?: number): number {
  if (override !== undefined && override > 0) {
    return Math.floor(override);
  }
  return Math.min(DEFAULT_CHUNK_BUDGET, Math.floor(getContextWindow(model) / 2));
}
