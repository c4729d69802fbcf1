// Table artifacts: writers and readers for each physical format

export { getTableWriter, getTableReader } from './registry.js';
export { ArrowTableWriter, ArrowTableReader, toArrowTable, arrowTypeFor, COLUMN_TYPE_METADATA_KEY } from './arrow.js';
export { CsvTableWriter, CsvTableReader, formatCsv, parseCsv, quoteCsvField, type CsvField } from './csv.js';
export { JsonTableWriter, JsonTableReader, NdjsonTableWriter, NdjsonTableReader } from './json.js';
export { normalizeInt, cellToJson, cellFromJson, cellToText, cellFromText } from './cells.js';
export { writeArtifact, pathExists } from './fs.js';
