/**
 * CLI Output Formatting
 *
 * JSON for scripts, plain text for people.
 */

export type OutputFormat = 'json' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text'];

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  return formatAsText(result);
}

function formatAsText(result: unknown): string {
  if (typeof result === 'string') {
    return result;
  }
  if (Array.isArray(result)) {
    return formatList(result);
  }
  if (result && typeof result === 'object') {
    return formatObjectAsKeyValue(result);
  }
  return String(result);
}

function formatList(items: unknown[]): string {
  if (items.length === 0) return '(none)';
  return items.map((item) => `- ${formatValue(item)}`).join('\n');
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function formatObjectAsKeyValue(obj: object): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      lines.push(`${key}:`, formatList(value));
    } else if (typeof value === 'string' && value.includes('\n')) {
      lines.push(`${key}:`, value);
    } else {
      lines.push(`${key}: ${formatValue(value)}`);
    }
  }
  return lines.join('\n');
}
