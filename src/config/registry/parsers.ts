/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 * These handle string-to-type conversion with defaults and validation.
 */

// =============================================================================
// PRIMITIVE PARSERS
// =============================================================================

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Parse a string env var as floating point number.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 */
export function parseString<T extends string>(
  value: string | undefined,
  defaultValue: T,
  allowedValues: readonly T[]
): T {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  return allowedValues.find((allowed) => allowed === lower) ?? defaultValue;
}

// =============================================================================
// PROVIDER DETECTION
// =============================================================================

export const LLM_PROVIDERS = ['openai', 'anthropic', 'ollama'] as const;

/**
 * Determine the language model provider with fallback logic.
 * An explicit value wins; otherwise API keys are checked in order OpenAI > Anthropic.
 */
export function detectLlmProvider(
  value: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): 'openai' | 'anthropic' | 'ollama' {
  const explicit = value?.toLowerCase();
  const match = LLM_PROVIDERS.find((provider) => provider === explicit);
  if (match) return match;
  if (env.OPENAI_API_KEY) return 'openai';
  if (env.ANTHROPIC_API_KEY) return 'anthropic';
  return 'openai';
}
