/**
 * Structured logging utility using pino
 *
 * Provides consistent logging across the application with:
 * - Environment-based log levels
 * - Structured JSON logging for production
 * - Pretty printing for development
 * - Component-based context
 *
 * Logs always go to stderr: stdout carries CLI output.
 */

import pino from 'pino';
import { config } from '../config/index.js';

// Detect test environment and suppress logs to keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const loggingEnabled = !isTest;

/**
 * Common pino options with security redaction
 */
const pinoOptions: pino.LoggerOptions = {
  level: config.logging.level,
  enabled: loggingEnabled,
  redact: {
    paths: [
      'apiKey',
      'api_key',
      'openaiApiKey',
      'anthropicApiKey',
      'assemblyaiApiKey',
      'token',
      'authorization',
      'Authorization',
      '*.apiKey',
      '*.api_key',
      '*.token',
      'headers.authorization',
      'headers.Authorization',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
};

const usePretty =
  loggingEnabled && config.logging.pretty && config.runtime.nodeEnv !== 'production';

export const logger = usePretty
  ? pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(pinoOptions, pino.destination({ dest: 2, sync: false }));

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'chunker', 'openai-provider')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
