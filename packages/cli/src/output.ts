/**
 * CLI Output Formatting
 *
 * Plain-text tables for terminals and JSON for scripting.
 * Cells from query results and reports are rendered the same way in both.
 */

import { bytesToBase64 } from '@flatlog/protocol';

export interface TableOptions {
  /** Maximum width of a column before its cells are truncated */
  maxWidth?: number;
}

// ============================================================================
// Cells
// ============================================================================

/**
 * Render a query cell for a text table. SQL NULL prints as "NULL".
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Uint8Array) return bytesToBase64(value);
  return String(value);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return bytesToBase64(value);
  return value;
}

// ============================================================================
// JSON Formatting
// ============================================================================

/**
 * Format data as indented JSON. Integers beyond the double range print as
 * strings and byte values as base64.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, jsonReplacer, 2);
}

// ============================================================================
// Table Formatting
// ============================================================================

/**
 * Format rows as an aligned text table with a header and separator line.
 */
export function formatTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  options: TableOptions = {}
): string {
  const maxWidth = options.maxWidth ?? 50;

  const widths = headers.map((header, i) =>
    rows.reduce((width, row) => Math.max(width, Math.min((row[i] ?? '').length, maxWidth)), header.length)
  );

  const line = (cells: readonly string[]) =>
    widths
      .map((width, i) => {
        const value = cells[i] ?? '';
        const truncated = value.length > maxWidth ? value.slice(0, maxWidth - 3) + '...' : value;
        return truncated.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  const separator = widths.map((width) => '-'.repeat(width)).join('  ');
  return [line(headers), separator, ...rows.map(line)].join('\n');
}

/**
 * "1 row" / "3 rows"
 */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
