import { mapError } from '../../utils/error-mapper.js';

/**
 * Print a mapped error to stderr as JSON and exit with status 1.
 * stdout stays reserved for command output.
 */
export function handleCliError(error: unknown): never {
  const { message, code, details } = mapError(error);
  const body = details ? { error: message, code, details } : { error: message, code };

  process.stderr.write(`${JSON.stringify(body, null, 2)}\n`);
  process.exit(1);
}
