/**
 * Config registry metadata.
 *
 * Every option is described once (environment key, default, description,
 * zod schema, parser) and the config object, its validation and the
 * `config` command listing are all derived from that description.
 */

import type { z } from 'zod';

/** Built-in conversions from an environment string */
export type ParserType = 'string' | 'boolean' | 'number' | 'int';

/**
 * Option-specific conversion. `env` is the whole environment being read,
 * for options that fall back to another variable.
 */
export type CustomParser<T> = (
  envValue: string | undefined,
  defaultValue: T,
  env: NodeJS.ProcessEnv
) => T;

export interface ConfigOptionMeta<T = unknown> {
  /** e.g. `MEETING_NOTES_CHUNK_BUDGET` */
  envKey: string;
  defaultValue: T;
  description: string;
  schema: z.ZodType<T>;
  /** Inferred from the default's type when omitted */
  parse?: ParserType | CustomParser<T>;
  /** Enum values for the `string` parser; anything else falls back to the default */
  allowedValues?: readonly string[];
  /** API keys: the default is hidden from `getAllEnvVars` */
  sensitive?: boolean;
}

export interface ConfigSectionMeta {
  name: string;
  description: string;
  /** Keyed by the property name in the built config */
  options: Record<string, ConfigOptionMeta>;
}

export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}
