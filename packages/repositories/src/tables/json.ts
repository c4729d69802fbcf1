// JSON and NDJSON table artifacts
// JSON: one indented array of records. NDJSON: one record per line.

import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import {
  ValidationError,
  readNdjsonLines,
  stringifyNdjsonLine,
  type JsonValue,
  type ProjectedRow,
  type TableSchema,
} from '@flatlog/protocol';
import type { TableData, TableReader, TableWriter, WriteTableResult } from '../interfaces/index.js';
import { cellFromJson, cellToJson } from './cells.js';
import { writeArtifact } from './fs.js';

const jsonRecordSchema = z.record(z.string(), z.unknown());
const jsonTableSchema = z.array(jsonRecordSchema);

type JsonRecord = z.infer<typeof jsonRecordSchema>;

/**
 * Convert a projected row to a JSON record keyed by column name
 */
export function rowToRecord(schema: TableSchema, row: ProjectedRow): { [key: string]: JsonValue } {
  return Object.fromEntries(schema.map((column, i) => [column.name, cellToJson(row[i] ?? null)]));
}

/**
 * Convert a JSON record to a row aligned with the schema.
 * Columns the record lacks are null.
 */
export function recordToRow(schema: TableSchema, record: JsonRecord): ProjectedRow {
  return schema.map((column) =>
    cellFromJson(Object.hasOwn(record, column.name) ? record[column.name] : null, column)
  );
}

export class JsonTableWriter implements TableWriter {
  readonly format = 'json' as const;

  async write(table: TableData, path: string): Promise<WriteTableResult> {
    const records = table.rows.map((row) => rowToRecord(table.schema, row));
    const bytesWritten = await writeArtifact(path, JSON.stringify(records, null, 2) + '\n');
    return { path, format: this.format, rowCount: table.rows.length, bytesWritten };
  }
}

export class JsonTableReader implements TableReader {
  readonly format = 'json' as const;

  async *read(path: string, schema: TableSchema): AsyncGenerator<ProjectedRow> {
    const content = await fs.readFile(path, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(
        `Invalid JSON table ${path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const result = jsonTableSchema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError(`JSON table ${path} is not an array of records`, {
        details: { issues: result.error.issues },
      });
    }

    for (const record of result.data) {
      yield recordToRow(schema, record);
    }
  }
}

export class NdjsonTableWriter implements TableWriter {
  readonly format = 'ndjson' as const;

  async write(table: TableData, path: string): Promise<WriteTableResult> {
    const content = table.rows.map((row) => stringifyNdjsonLine(rowToRecord(table.schema, row))).join('');
    const bytesWritten = await writeArtifact(path, content);
    return { path, format: this.format, rowCount: table.rows.length, bytesWritten };
  }
}

export class NdjsonTableReader implements TableReader {
  readonly format = 'ndjson' as const;

  async *read(path: string, schema: TableSchema): AsyncGenerator<ProjectedRow> {
    for await (const { line, text } of readNdjsonLines(createReadStream(path))) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (error) {
        throw new ValidationError(
          `Invalid NDJSON table ${path} at line ${line}: ${error instanceof Error ? error.message : String(error)}`
        );
      }

      const result = jsonRecordSchema.safeParse(parsed);
      if (!result.success) {
        throw new ValidationError(`NDJSON table ${path} line ${line} is not a record`);
      }
      yield recordToRow(schema, result.data);
    }
  }
}
