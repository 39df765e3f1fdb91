/**
 * Type-safe action wrapper for Commander.js
 *
 * Commander.js passes handlers loosely typed arguments. These wrappers read
 * the command's options (global ones included) through the generic
 * optsWithGlobals() and route failures to handleCliError.
 */

import type { Command, OptionValues } from 'commander';
import type { OutputFormat } from './output.js';
import { handleCliError } from './errors.js';

/**
 * Global CLI options available to all commands via --option flags
 */
export interface GlobalOptions extends OptionValues {
  /** Output format: json or text */
  format: OutputFormat;
}

/**
 * Wrap a handler for a command taking one positional argument
 *
 * @example
 * ```typescript
 * program
 *   .command('summarize <file>')
 *   .option('--model <model>')
 *   .action(typedAction<{ model?: string }>(async (file, options) => {
 *     console.log(file, options.model, options.format);
 *   }));
 * ```
 */
export function typedAction<TOptions extends OptionValues>(
  handler: (argument: string, options: TOptions & GlobalOptions) => Promise<void>
): (argument: string, options: unknown, cmd: Command) => Promise<void> {
  return async (argument: string, _options: unknown, cmd: Command) => {
    try {
      await handler(argument, cmd.optsWithGlobals<TOptions & GlobalOptions>());
    } catch (error) {
      handleCliError(error);
    }
  };
}

/**
 * Wrap a handler for a command without positional arguments
 */
export function typedCommandAction<TOptions extends OptionValues>(
  handler: (options: TOptions & GlobalOptions) => Promise<void>
): (options: unknown, cmd: Command) => Promise<void> {
  return async (_options: unknown, cmd: Command) => {
    try {
      await handler(cmd.optsWithGlobals<TOptions & GlobalOptions>());
    } catch (error) {
      handleCliError(error);
    }
  };
}
