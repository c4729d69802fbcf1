// Table types - flattened rows, unified schemas and projected rows

/**
 * Column types a unified table can carry.
 * json_text holds the serialized form of an array too long to spread into slots.
 */
export type ColumnType = 'bool' | 'int64' | 'float64' | 'string' | 'bytes' | 'json_text';

export const COLUMN_TYPES: readonly ColumnType[] = [
  'bool',
  'int64',
  'float64',
  'string',
  'bytes',
  'json_text',
] as const;

/**
 * A single column of a unified table.
 */
export type ColumnSchema = {
  name: string;
  type: ColumnType;
  nullable: boolean;
};

/**
 * Ordered columns of one table. Names are unique; order is first-seen order.
 */
export type TableSchema = readonly ColumnSchema[];

/**
 * Serialized text of a sequence that exceeded the array slot limit.
 * Kept distinct from plain strings so the unifier can type the column json_text.
 */
export class JsonText {
  constructor(readonly text: string) {}

  toString(): string {
    return this.text;
  }
}

/**
 * A value in a flattened row, before the column type is known.
 */
export type FlatCell = boolean | number | bigint | string | Uint8Array | JsonText | null;

/**
 * One flattened record: dotted column path to cell, in insertion order.
 */
export type FlatRow = Map<string, FlatCell>;

/**
 * A value in a projected row, converted to its column's final type.
 * int64 columns hold a number when it is a safe integer, otherwise a bigint.
 */
export type ProjectedCell = boolean | number | bigint | string | Uint8Array | null;

/**
 * One row of a rectangular table, aligned with its TableSchema.
 */
export type ProjectedRow = ProjectedCell[];

/**
 * Columns present on every flattened row, in this order.
 */
export const BASELINE_COLUMNS = {
  TOPIC: 'topic',
  TIMESTAMP: 'timestamp',
  MSGTYPE: 'msgtype',
  HEADER_TIMESTAMP: 'header_timestamp',
} as const;

/**
 * The schema a channel starts from before any record is seen.
 */
export const BASELINE_SCHEMA: TableSchema = [
  { name: BASELINE_COLUMNS.TOPIC, type: 'string', nullable: false },
  { name: BASELINE_COLUMNS.TIMESTAMP, type: 'float64', nullable: false },
  { name: BASELINE_COLUMNS.MSGTYPE, type: 'string', nullable: false },
  { name: BASELINE_COLUMNS.HEADER_TIMESTAMP, type: 'float64', nullable: true },
];

/**
 * Check whether a column name is one of the baseline columns.
 */
export function isBaselineColumn(name: string): boolean {
  return BASELINE_SCHEMA.some((column) => column.name === name);
}

/**
 * The kinds of value the unifier observes in a column.
 */
export type CellKind = 'bool' | 'int' | 'float' | 'string' | 'bytes' | 'json_text';

/**
 * A column whose observed values did not agree on one type and was widened.
 * Informational: widening is resolved automatically and is never fatal.
 */
export type SchemaConflict = {
  column: string;
  observed: CellKind[];
  resolved: ColumnType;
};

/**
 * A fully materialized table for one channel.
 */
export type MaterializedTable = {
  channel: string;
  schema: TableSchema;
  rows: ProjectedRow[];
  conflicts: SchemaConflict[];
};
