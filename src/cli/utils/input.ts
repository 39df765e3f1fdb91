/**
 * CLI input helpers
 */

import { readFile } from 'node:fs/promises';
import { InvalidArgumentError } from 'commander';

/** Path argument meaning "read standard input" */
export const STDIN_PATH = '-';

async function readStdin(): Promise<string> {
  const parts: string[] = [];
  process.stdin.setEncoding('utf8');
  for await (const chunk of process.stdin) {
    parts.push(String(chunk));
  }
  return parts.join('');
}

/**
 * Read a transcript from a file, or from stdin when the path is `-`
 */
export async function readTranscript(path: string): Promise<string> {
  if (path === STDIN_PATH) {
    return readStdin();
  }
  return readFile(path, 'utf8');
}

/**
 * Commander argument parser for positive integer option values
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
