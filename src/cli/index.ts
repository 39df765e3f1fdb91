/**
 * CLI Main Program
 *
 * Commander.js program setup for the meeting-notes CLI.
 */

import { Command, Option } from 'commander';

import { addSummarizeCommand, addActionItemsCommand, addChunkCommand } from './commands/summarize.js';
import { addTranscribeCommand, addTranscriptCommand, addNotesCommand } from './commands/transcribe.js';
import { addConfigCommand } from './commands/config.js';
import { OUTPUT_FORMATS } from './utils/output.js';
import { VERSION } from '../version.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('meeting-notes')
    .description('Summarize audio transcriptions and extract action items')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('json')
    );

  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  // Transcript text
  addSummarizeCommand(program);
  addActionItemsCommand(program);
  addChunkCommand(program);

  // Audio
  addTranscribeCommand(program);
  addTranscriptCommand(program);
  addNotesCommand(program);

  addConfigCommand(program);
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
