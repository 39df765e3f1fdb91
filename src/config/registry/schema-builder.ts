/**
 * Zod Schema Builder
 *
 * Registry-driven config building plus Zod validation with readable errors.
 */

import type { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseBoolean, parseNumber, parseInt_, parseString } from './parsers.js';
import { createValidationError } from '../../core/errors.js';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

/**
 * Validate a config object against a schema.
 * Returns the validated config or throws with every failing path listed.
 */
export function validateConfig<T>(config: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(config);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    const errorMessage = `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`;
    throw createValidationError('config', errorMessage);
  }

  return result.data;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from the option's default when not explicitly specified
 */
function inferParser(defaultValue: unknown): ParserType {
  if (typeof defaultValue === 'boolean') return 'boolean';
  if (typeof defaultValue === 'number') return 'number';
  return 'string';
}

/**
 * Parse an environment variable value using the option's parser
 */
function parseEnvValue(
  option: ConfigOptionMeta,
  envValue: string | undefined,
  env: NodeJS.ProcessEnv
): unknown {
  const defaultValue = option.defaultValue;

  // If custom parser function is provided, use it
  if (typeof option.parse === 'function') {
    return option.parse(envValue, defaultValue, env);
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  const parserType = option.parse ?? inferParser(defaultValue);
  const numericDefault = typeof defaultValue === 'number' ? defaultValue : Number.NaN;

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);
    case 'number':
      return parseNumber(envValue, numericDefault);
    case 'int':
      return parseInt_(envValue, numericDefault);
    case 'string':
      if (option.allowedValues && typeof defaultValue === 'string') {
        return parseString(envValue, defaultValue, option.allowedValues);
      }
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
function buildSectionFromRegistry(
  section: ConfigSectionMeta,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    result[key] = parseEnvValue(option, env[option.envKey], env);
  }

  return result;
}

/**
 * Build the raw (unvalidated) config from registry metadata.
 */
export function buildConfigFromRegistry(
  registry: ConfigRegistry,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section, env);
  }

  return result;
}

/**
 * List every environment variable the registry knows about
 */
export function getAllEnvVars(registry: ConfigRegistry): Array<{
  envKey: string;
  description: string;
  defaultValue: unknown;
  sensitive: boolean;
  section: string;
}> {
  return Object.entries(registry.sections).flatMap(([sectionKey, section]) =>
    Object.values(section.options).map((option) => ({
      envKey: option.envKey,
      description: option.description,
      defaultValue: option.sensitive ? undefined : option.defaultValue,
      sensitive: option.sensitive ?? false,
      section: sectionKey,
    }))
  );
}
