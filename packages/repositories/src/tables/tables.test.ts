// Tests for table writers and readers

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  UnsupportedFormatError,
  ValidationError,
  type ProjectedRow,
  type TableFormat,
  type TableSchema,
} from '@flatlog/protocol';
import type { TableData } from '../interfaces/index.js';
import {
  COLUMN_TYPE_METADATA_KEY,
  cellFromText,
  formatCsv,
  getTableReader,
  getTableWriter,
  parseCsv,
  toArrowTable,
  writeArtifact,
} from './index.js';

const BIG = 2n ** 60n;

const TABLE: TableData = {
  schema: [
    { name: 'topic', type: 'string', nullable: false },
    { name: 'timestamp', type: 'float64', nullable: false },
    { name: 'count', type: 'int64', nullable: false },
    { name: 'big', type: 'int64', nullable: false },
    { name: 'flag', type: 'bool', nullable: true },
    { name: 'blob', type: 'bytes', nullable: true },
    { name: 'samples', type: 'json_text', nullable: true },
    { name: 'note', type: 'string', nullable: true },
  ],
  rows: [
    ['/imu', 1.5, 3, BIG, true, new Uint8Array([1, 2, 3]), '[1,2,3,4,5,6]', ''],
    ['/imu', 2, -7, 5, false, null, null, null],
  ],
};

async function collect(rows: AsyncIterable<ProjectedRow>): Promise<ProjectedRow[]> {
  const result: ProjectedRow[] = [];
  for await (const row of rows) {
    result.push(row);
  }
  return result;
}

describe('table artifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'flatlog-tables-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const formats: TableFormat[] = ['arrow', 'csv', 'json', 'ndjson'];

  it.each(formats)('should read back what the %s writer wrote', async (format) => {
    const path = join(dir, 'nested', `table.${format}`);

    const result = await getTableWriter(format).write(TABLE, path);
    const rows = await collect(getTableReader(format).read(path, TABLE.schema));

    expect(result.path).toBe(path);
    expect(result.format).toBe(format);
    expect(result.rowCount).toBe(2);
    expect(result.bytesWritten).toBe((await readFile(path)).byteLength);
    expect(rows).toEqual(TABLE.rows);
  });

  it.each(formats)('should write an empty %s table', async (format) => {
    const path = join(dir, `empty.${format}`);
    const empty: TableData = { schema: TABLE.schema, rows: [] };

    await getTableWriter(format).write(empty, path);

    expect(await collect(getTableReader(format).read(path, TABLE.schema))).toEqual([]);
  });

  it('should replace an existing artifact without leaving temporary files', async () => {
    const path = join(dir, 'table.csv');
    await writeFile(path, 'old\n');

    expect(await writeArtifact(path, 'new\n')).toBe(4);

    expect(await readFile(path, 'utf-8')).toBe('new\n');
    expect(await readdir(dir)).toEqual(['table.csv']);
  });

  it('should write JSON as an indented array of records', async () => {
    const path = join(dir, 'small.json');
    const schema: TableSchema = [
      { name: 'a', type: 'int64', nullable: false },
      { name: 'b', type: 'string', nullable: true },
    ];

    await getTableWriter('json').write({ schema, rows: [[1, null]] }, path);

    expect(await readFile(path, 'utf-8')).toBe('[\n  {\n    "a": 1,\n    "b": null\n  }\n]\n');
  });

  it('should write NDJSON as one record per line', async () => {
    const path = join(dir, 'small.ndjson');
    const schema: TableSchema = [{ name: 'a', type: 'int64', nullable: false }];

    await getTableWriter('ndjson').write({ schema, rows: [[1], [BIG]] }, path);

    expect(await readFile(path, 'utf-8')).toBe('{"a":1}\n{"a":"1152921504606846976"}\n');
  });

  it('should record the column type in Arrow field metadata', () => {
    const table = toArrowTable(TABLE);

    expect(table.schema.fields.map((f) => f.name)).toEqual(TABLE.schema.map((c) => c.name));
    expect(table.schema.fields[6].metadata.get(COLUMN_TYPE_METADATA_KEY)).toBe('json_text');
  });

  it('should keep Arrow column order for integer-like names', async () => {
    const path = join(dir, 'order.arrow');
    const schema: TableSchema = [
      { name: 'topic', type: 'string', nullable: false },
      { name: '1', type: 'int64', nullable: true },
      { name: '0', type: 'int64', nullable: true },
    ];

    await getTableWriter('arrow').write({ schema, rows: [['/a', 1, 0]] }, path);

    expect(toArrowTable({ schema, rows: [] }).schema.fields.map((f) => f.name)).toEqual(['topic', '1', '0']);
    expect(await collect(getTableReader('arrow').read(path, schema))).toEqual([['/a', 1, 0]]);
  });

  it('should read columns by name and fill missing ones with null', async () => {
    const path = join(dir, 'reordered.csv');
    await writeFile(path, 'b,a\n2,x\n');
    const schema: TableSchema = [
      { name: 'a', type: 'string', nullable: true },
      { name: 'b', type: 'int64', nullable: true },
      { name: 'c', type: 'bool', nullable: true },
    ];

    expect(await collect(getTableReader('csv').read(path, schema))).toEqual([['x', 2, null]]);
  });

  it('should reject unknown formats', () => {
    expect(() => getTableWriter('parquet')).toThrow(UnsupportedFormatError);
    expect(() => getTableReader('xlsx')).toThrow(UnsupportedFormatError);
  });
});

describe('formatCsv', () => {
  it('should distinguish empty strings from nulls', () => {
    const schema: TableSchema = [
      { name: 'a', type: 'string', nullable: true },
      { name: 'b', type: 'int64', nullable: true },
    ];

    const text = formatCsv({
      schema,
      rows: [
        ['x,y', 1],
        ['', null],
        [null, 2],
      ],
    });

    expect(text).toBe('a,b\n"x,y",1\n"",\n,2\n');
  });
});

describe('parseCsv', () => {
  it('should handle quotes, escaped quotes, CRLF and embedded newlines', () => {
    expect(parseCsv('a,b\r\n"line1\nline2","say ""hi"""\r\n')).toEqual([
      [
        { text: 'a', quoted: false },
        { text: 'b', quoted: false },
      ],
      [
        { text: 'line1\nline2', quoted: true },
        { text: 'say "hi"', quoted: true },
      ],
    ]);
  });

  it('should accept a missing final newline', () => {
    expect(parseCsv('a\n1')).toEqual([[{ text: 'a', quoted: false }], [{ text: '1', quoted: false }]]);
  });

  it('should reject an unterminated quoted field', () => {
    expect(() => parseCsv('a\n"open')).toThrow(ValidationError);
  });
});

describe('cellFromText', () => {
  it('should convert text by column type', () => {
    expect(cellFromText('true', { name: 'f', type: 'bool', nullable: true })).toBe(true);
    expect(cellFromText('-12', { name: 'n', type: 'int64', nullable: true })).toBe(-12);
    expect(cellFromText('9007199254740993', { name: 'n', type: 'int64', nullable: true })).toBe(
      9007199254740993n
    );
    expect(cellFromText('2.5', { name: 'x', type: 'float64', nullable: true })).toBe(2.5);
  });

  it('should reject text that does not fit the column', () => {
    expect(() => cellFromText('abc', { name: 'n', type: 'int64', nullable: true })).toThrow(
      'Value "abc" does not fit column "n" of type int64'
    );
    expect(() => cellFromText('', { name: 'x', type: 'float64', nullable: true })).toThrow(ValidationError);
  });
});
