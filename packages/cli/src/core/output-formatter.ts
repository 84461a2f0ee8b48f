/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

export type TableRow = Record<string, unknown>;

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format output as a simple table
 */
export function formatTable(data: readonly TableRow[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  // Auto-detect columns if not provided
  const detectedColumns = columns ?? Object.keys(data[0]);

  // Calculate column widths
  const widths = new Map<string, number>();
  for (const col of detectedColumns) {
    widths.set(
      col,
      Math.max(col.length, ...data.map((row) => valueToString(row[col]).length))
    );
  }
  const pad = (text: string, col: string): string => text.padEnd(widths.get(col) ?? 0);

  const lines: string[] = [];

  // Header
  lines.push(detectedColumns.map((col) => pad(col, col)).join(' | '));
  lines.push(detectedColumns.map((col) => '-'.repeat(widths.get(col) ?? 0)).join('-|-'));

  // Rows
  for (const row of data) {
    lines.push(detectedColumns.map((col) => pad(valueToString(row[col]), col)).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format data in the requested format
 *
 * `rows` is the tabular view of `data`; JSON output always prints `data`
 * in full.
 */
export function formatOutput(
  data: unknown,
  format: OutputFormat,
  rows: readonly TableRow[] = [],
  preamble: readonly string[] = []
): string {
  switch (format) {
    case 'json':
      return formatJSON(data);
    case 'table':
      return [...preamble, ...(preamble.length > 0 ? [''] : []), formatTable(rows)].join('\n');
  }
}
