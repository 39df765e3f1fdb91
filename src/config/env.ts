import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';

let loaded = false;

/**
 * Load `.env` from `cwd` into `process.env`, once per process.
 * Variables already set in the environment are not overridden.
 */
export function loadEnv(cwd: string = process.cwd()): void {
  if (loaded) return;
  loaded = true;

  const envPath = resolve(cwd, '.env');
  if (existsSync(envPath)) {
    // quiet: stdout carries command output
    dotenvConfig({ path: envPath, quiet: true });
  }
}
