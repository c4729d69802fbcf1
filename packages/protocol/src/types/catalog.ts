// Catalog types - registered tables and the formats they are stored in

import type { Timestamp } from './common.js';
import type { TableSchema } from './tables.js';

/**
 * Physical encodings a table artifact can be written in.
 * - arrow: Arrow IPC file (columnar)
 * - csv: delimited text with a header row
 * - json: one JSON array of row objects
 * - ndjson: one JSON object per line
 */
export type TableFormat = 'arrow' | 'csv' | 'json' | 'ndjson';

export const TABLE_FORMATS: readonly TableFormat[] = ['arrow', 'csv', 'json', 'ndjson'] as const;

/**
 * File extension used for each table format.
 */
export const TABLE_FORMAT_EXTENSIONS: Record<TableFormat, string> = {
  arrow: '.arrow',
  csv: '.csv',
  json: '.json',
  ndjson: '.ndjson',
};

/**
 * Check whether a string names a supported table format.
 */
export function isTableFormat(value: string): value is TableFormat {
  return TABLE_FORMATS.some((format) => format === value);
}

/**
 * Infer a table format from a file path's extension.
 * @returns The format, or null when the extension is not recognised
 */
export function formatFromPath(filePath: string): TableFormat | null {
  const lower = filePath.toLowerCase();
  for (const format of TABLE_FORMATS) {
    if (lower.endsWith(TABLE_FORMAT_EXTENSIONS[format])) {
      return format;
    }
  }
  if (lower.endsWith('.jsonl')) return 'ndjson';
  return null;
}

/**
 * A table registered in a catalog.
 * Entries are never mutated; a forced re-registration replaces the whole entry.
 */
export type CatalogEntry = {
  /**
   * SQL-visible relation name, unique within the catalog
   */
  tableName: string;

  /**
   * Recording(s) the table was converted from
   */
  sourceFile: string;

  /**
   * Location of the table artifact
   */
  physicalPath: string;

  /**
   * Encoding of the artifact at physicalPath
   */
  format: TableFormat;

  schema: TableSchema;

  /**
   * sha256 over the schema's canonical JSON, for spotting drift between runs
   */
  schemaFingerprint: string;

  rowCount: number;

  createdAt: Timestamp;
};

/**
 * Valid catalog table names: a SQL identifier that needs no quoting.
 */
export const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Turn an arbitrary label (file stem, channel name) into a valid table name.
 *
 * @example
 * ```typescript
 * toTableName('run-01', '/imu/data'); // "run_01_imu_data"
 * ```
 */
export function toTableName(...parts: string[]): string {
  const joined = parts
    .map((part) => part.replace(/[^A-Za-z0-9_]+/g, '_').replace(/^_+|_+$/g, ''))
    .filter((part) => part.length > 0)
    .join('_');

  if (!joined) return 't_';
  return /^[0-9]/.test(joined) ? `t_${joined}` : joined;
}
