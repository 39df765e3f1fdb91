/**
 * Token estimation
 *
 * Length heuristic, not a tokenizer. Deterministic and provider-independent.
 */

/**
 * Characters per token estimate (rough average for English prose)
 */
export const CHARS_PER_TOKEN = 4;

/**
 * Approximate number of model tokens `text` will consume.
 */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}
