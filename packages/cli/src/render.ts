import type { JsonValue, ParsedSpec, SchemockError } from '@schemock/core';
import type { OutputFormat } from './flags.js';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

/**
 * JSON prints a single value as itself and several as an array;
 * NDJSON prints one compact value per line.
 */
export function formatValues(
  values: readonly JsonValue[],
  format: OutputFormat
): string {
  if (format === 'ndjson') {
    return values.length > 0
      ? `${values.map((value) => JSON.stringify(value)).join('\n')}\n`
      : '';
  }
  const body = values.length === 1 ? values[0] : values;
  return `${JSON.stringify(body, null, 2)}\n`;
}

/** One tab-separated line per operation: method, path, operationId, statuses. */
export function formatRoutes(spec: ParsedSpec): string {
  const lines = spec.operations.map((op) => {
    const statuses = Array.from(new Set(op.responses.map((r) => r.status)));
    return [
      op.method.toUpperCase(),
      op.path,
      op.operationId ?? '-',
      statuses.length > 0 ? statuses.join(',') : '-',
    ].join('\t');
  });
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export function formatCliError(error: SchemockError, useColor = false): string {
  const head = colorize(`[schemock] ${error.errorCode}`, useColor, ANSI.bold);
  const line = `${head}: ${error.message}`;
  return `${colorize(line, useColor, ANSI.red)}\n`;
}
