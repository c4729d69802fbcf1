import type { ProjectedRow, TableFormat, TableSchema } from '@flatlog/protocol';

/**
 * A rectangular table ready to be written
 */
export type TableData = {
  schema: TableSchema;
  rows: readonly ProjectedRow[];
};

/**
 * Result of writing a table artifact
 */
export type WriteTableResult = {
  path: string;
  format: TableFormat;
  rowCount: number;
  bytesWritten: number;
};

/**
 * Persists a table in one physical encoding.
 * The writer creates parent directories and replaces any existing file.
 */
export interface TableWriter {
  readonly format: TableFormat;

  write(table: TableData, path: string): Promise<WriteTableResult>;
}

/**
 * Reads a table artifact back as rows aligned with a known schema.
 * Text encodings lose type information, so the schema drives value conversion.
 */
export interface TableReader {
  readonly format: TableFormat;

  read(path: string, schema: TableSchema): AsyncIterable<ProjectedRow>;
}
