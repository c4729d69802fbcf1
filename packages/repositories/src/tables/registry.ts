// Table writer/reader lookup by format

import { UnsupportedFormatError, isTableFormat, type TableFormat } from '@flatlog/protocol';
import type { TableReader, TableWriter } from '../interfaces/index.js';
import { ArrowTableReader, ArrowTableWriter } from './arrow.js';
import { CsvTableReader, CsvTableWriter } from './csv.js';
import { JsonTableReader, JsonTableWriter, NdjsonTableReader, NdjsonTableWriter } from './json.js';

const writers: Record<TableFormat, TableWriter> = {
  arrow: new ArrowTableWriter(),
  csv: new CsvTableWriter(),
  json: new JsonTableWriter(),
  ndjson: new NdjsonTableWriter(),
};

const readers: Record<TableFormat, TableReader> = {
  arrow: new ArrowTableReader(),
  csv: new CsvTableReader(),
  json: new JsonTableReader(),
  ndjson: new NdjsonTableReader(),
};

/**
 * Get the writer for a format.
 * @throws UnsupportedFormatError for an unknown format
 */
export function getTableWriter(format: string): TableWriter {
  if (!isTableFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  return writers[format];
}

/**
 * Get the reader for a format.
 * @throws UnsupportedFormatError for an unknown format
 */
export function getTableReader(format: string): TableReader {
  if (!isTableFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  return readers[format];
}
