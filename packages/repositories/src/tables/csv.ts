// CSV table artifacts (RFC 4180 quoting, header row of column names)
//
// A null cell is an empty unquoted field; an empty string is written as "".
// The reader needs the table schema to restore types; CSV carries none.

import * as fs from 'node:fs/promises';
import { ValidationError, type ProjectedRow, type TableSchema } from '@flatlog/protocol';
import type { TableData, TableReader, TableWriter, WriteTableResult } from '../interfaces/index.js';
import { cellFromText, cellToText } from './cells.js';
import { writeArtifact } from './fs.js';

/**
 * One parsed CSV field
 */
export type CsvField = {
  text: string;
  /** Whether the field was enclosed in quotes (distinguishes "" from null) */
  quoted: boolean;
};

const NEEDS_QUOTES = /[",\r\n]/;

/**
 * Quote a field when it contains a delimiter, quote or line break, or is empty
 */
export function quoteCsvField(text: string): string {
  if (text === '' || NEEDS_QUOTES.test(text) || text !== text.trim()) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * Render a table as CSV text
 */
export function formatCsv(table: TableData): string {
  const lines = [table.schema.map((column) => quoteCsvField(column.name)).join(',')];
  for (const row of table.rows) {
    lines.push(
      table.schema
        .map((_, i) => {
          const cell = row[i] ?? null;
          return cell === null ? '' : quoteCsvField(cellToText(cell));
        })
        .join(',')
    );
  }
  return lines.join('\n') + '\n';
}

/**
 * Split CSV text into records of fields.
 * Quoted fields may contain delimiters, doubled quotes and line breaks.
 */
export function parseCsv(content: string): CsvField[][] {
  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  const records: CsvField[][] = [];
  let row: CsvField[] = [];
  let field = '';
  let quoted = false;
  let inQuotes = false;

  const pushField = () => {
    row.push({ text: field, quoted });
    field = '';
    quoted = false;
  };
  const pushRow = () => {
    pushField();
    records.push(row);
    row = [];
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
      quoted = true;
    } else if (ch === ',') {
      pushField();
    } else if (ch === '\n') {
      pushRow();
    } else if (ch !== '\r') {
      field += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new ValidationError('Unterminated quoted field in CSV');
  }

  // Content normally ends with a newline; only a non-empty tail is a record
  if (row.length > 0 || field !== '' || quoted) {
    pushRow();
  }

  return records;
}

export class CsvTableWriter implements TableWriter {
  readonly format = 'csv' as const;

  async write(table: TableData, path: string): Promise<WriteTableResult> {
    const bytesWritten = await writeArtifact(path, formatCsv(table));
    return { path, format: this.format, rowCount: table.rows.length, bytesWritten };
  }
}

export class CsvTableReader implements TableReader {
  readonly format = 'csv' as const;

  async *read(path: string, schema: TableSchema): AsyncGenerator<ProjectedRow> {
    const [header, ...records] = parseCsv(await fs.readFile(path, 'utf-8'));
    if (!header) return;

    const positions = schema.map((column) => header.findIndex((field) => field.text === column.name));

    for (const record of records) {
      yield schema.map((column, i) => {
        const field = positions[i] >= 0 ? record[positions[i]] : undefined;
        if (!field || (!field.quoted && field.text === '')) return null;
        return cellFromText(field.text, column);
      });
    }
  }
}
