/**
 * Logging Configuration Section
 *
 * Log level and output settings.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const loggingSection = {
  name: 'logging',
  description: 'Logging configuration.',
  options: {
    level: {
      envKey: 'LOG_LEVEL',
      defaultValue: 'info',
      description: 'Log level: fatal, error, warn, info, debug, trace, or silent.',
      schema: z.enum(LOG_LEVELS),
      allowedValues: LOG_LEVELS,
    },
    pretty: {
      envKey: 'MEETING_NOTES_LOG_PRETTY',
      defaultValue: true,
      description: 'Pretty-print logs with pino-pretty (ignored in production).',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;
