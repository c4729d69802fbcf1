// Arrow IPC file table artifacts (apache-arrow)

import * as fs from 'node:fs/promises';
import {
  Binary,
  Bool,
  Field,
  Float64,
  Int64,
  RecordBatch,
  Schema,
  Struct,
  Table,
  Utf8,
  makeBuilder,
  makeData,
  tableFromIPC,
  tableToIPC,
  type Data,
  type DataType,
} from 'apache-arrow';
import {
  ValidationError,
  type ColumnSchema,
  type ProjectedCell,
  type ProjectedRow,
  type TableSchema,
} from '@flatlog/protocol';
import type { TableData, TableReader, TableWriter, WriteTableResult } from '../interfaces/index.js';
import { normalizeInt } from './cells.js';
import { writeArtifact } from './fs.js';

/**
 * Field metadata key holding the flatlog column type.
 * Lets json_text survive a round trip through Utf8.
 */
export const COLUMN_TYPE_METADATA_KEY = 'flatlog.column_type';

/**
 * Arrow data type used to store each column type
 */
export function arrowTypeFor(column: ColumnSchema): DataType {
  switch (column.type) {
    case 'bool':
      return new Bool();
    case 'int64':
      return new Int64();
    case 'float64':
      return new Float64();
    case 'string':
    case 'json_text':
      return new Utf8();
    case 'bytes':
      return new Binary();
  }
}

function buildData<T extends DataType>(type: T, values: Iterable<T['TValue'] | null>): Data<T> {
  const builder = makeBuilder<T, null>({ type, nullValues: [null] });
  for (const value of values) {
    builder.append(value);
  }
  return builder.finish().flush();
}

function columnData(column: ColumnSchema, cells: ProjectedCell[]): Data {
  switch (column.type) {
    case 'bool':
      return buildData(new Bool(), cells.map((c) => (typeof c === 'boolean' ? c : null)));
    case 'int64':
      return buildData(
        new Int64(),
        cells.map((c) => (typeof c === 'bigint' ? c : typeof c === 'number' ? BigInt(c) : null))
      );
    case 'float64':
      return buildData(
        new Float64(),
        cells.map((c) => (typeof c === 'number' ? c : typeof c === 'bigint' ? Number(c) : null))
      );
    case 'string':
    case 'json_text':
      return buildData(
        new Utf8(),
        cells.map((c) => (c === null ? null : typeof c === 'string' ? c : String(c)))
      );
    case 'bytes':
      return buildData(new Binary(), cells.map((c) => (c instanceof Uint8Array ? c : null)));
  }
}

/**
 * Build an Arrow table with one field per column, in schema order
 */
export function toArrowTable(table: TableData): Table {
  const fields = table.schema.map(
    (column) =>
      new Field(
        column.name,
        arrowTypeFor(column),
        column.nullable,
        new Map([[COLUMN_TYPE_METADATA_KEY, column.type]])
      )
  );
  const children = table.schema.map((column, i) =>
    columnData(
      column,
      table.rows.map((row) => row[i] ?? null)
    )
  );

  const schema = new Schema(fields);
  const data = makeData({
    type: new Struct(schema.fields),
    length: table.rows.length,
    nullCount: 0,
    children,
  });
  return new Table([new RecordBatch(schema, data)]);
}

function cellFromArrow(value: unknown, column: ColumnSchema): ProjectedCell {
  if (value === null || value === undefined) return null;

  switch (column.type) {
    case 'bool':
      if (typeof value === 'boolean') return value;
      break;
    case 'int64':
      if (typeof value === 'bigint') return normalizeInt(value);
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      break;
    case 'float64':
      if (typeof value === 'number') return value;
      break;
    case 'string':
    case 'json_text':
      if (typeof value === 'string') return value;
      break;
    case 'bytes':
      if (value instanceof Uint8Array) return value;
      break;
  }

  throw new ValidationError(`Arrow value does not fit column "${column.name}" of type ${column.type}`, {
    field: column.name,
  });
}

export class ArrowTableWriter implements TableWriter {
  readonly format = 'arrow' as const;

  async write(table: TableData, path: string): Promise<WriteTableResult> {
    const bytesWritten = await writeArtifact(path, tableToIPC(toArrowTable(table), 'file'));
    return { path, format: this.format, rowCount: table.rows.length, bytesWritten };
  }
}

export class ArrowTableReader implements TableReader {
  readonly format = 'arrow' as const;

  async *read(path: string, schema: TableSchema): AsyncGenerator<ProjectedRow> {
    const table = tableFromIPC(await fs.readFile(path));
    const vectors = schema.map((column) => table.getChild(column.name));

    for (let r = 0; r < table.numRows; r++) {
      yield schema.map((column, i) => {
        const vector = vectors[i];
        return vector ? cellFromArrow(vector.get(r), column) : null;
      });
    }
  }
}
