#!/usr/bin/env node
// CLI entry point for meeting-notes.
// .env is loaded before the config module is first imported.

import { loadEnv } from './config/env.js';

async function main(): Promise<void> {
  loadEnv();

  const { runCli } = await import('./cli/index.js');
  await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
