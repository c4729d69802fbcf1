// Schema unifier - one table schema for all rows of a channel
//
// Phase 1 buffers rows and records which kinds of value each column holds.
// Phase 2 resolves every column type once, then projects each row onto the schema.
// Widening is global: a late string in an integer column turns the whole column into strings.

import {
  BASELINE_SCHEMA,
  ChannelBufferOverflowError,
  JsonText,
  bytesToBase64,
  type CellKind,
  type ColumnSchema,
  type ColumnType,
  type FlatCell,
  type FlatRow,
  type ProjectedCell,
  type ProjectedRow,
  type SchemaConflict,
  type TableSchema,
} from '@flatlog/protocol';
import { normalizeInt } from '@flatlog/repositories';
import { DEFAULT_MAX_ROWS_PER_CHANNEL } from '../config.js';

export type UnifyOptions = {
  /** Channel name, used in errors */
  channel?: string;
  /** Rows buffered before the channel fails (default 1,000,000) */
  maxRows?: number;
};

export type UnifyResult = {
  schema: TableSchema;
  rows: ProjectedRow[];
  conflicts: SchemaConflict[];
};

type ColumnStats = {
  /** Kind implied by a baseline column's seeded type */
  seeded?: CellKind;
  observed: Set<CellKind>;
  present: number;
  sawNull: boolean;
};

const KIND_ORDER: readonly CellKind[] = ['bool', 'int', 'float', 'string', 'bytes', 'json_text'];

const SINGLE_KIND_TYPES: Record<CellKind, ColumnType> = {
  bool: 'bool',
  int: 'int64',
  float: 'float64',
  string: 'string',
  bytes: 'bytes',
  json_text: 'json_text',
};

const SEEDED_KINDS: Record<ColumnType, CellKind> = {
  bool: 'bool',
  int64: 'int',
  float64: 'float',
  string: 'string',
  bytes: 'bytes',
  json_text: 'json_text',
};

/**
 * Kind of a non-null cell
 */
export function cellKind(cell: Exclude<FlatCell, null>): CellKind {
  if (typeof cell === 'boolean') return 'bool';
  if (typeof cell === 'bigint') return 'int';
  if (typeof cell === 'number') return Number.isInteger(cell) ? 'int' : 'float';
  if (typeof cell === 'string') return 'string';
  if (cell instanceof JsonText) return 'json_text';
  return 'bytes';
}

/**
 * Resolve the column type for a set of observed kinds.
 * One kind maps to its own type, int with float widens to float64,
 * any other mixture widens to string. No kinds at all gives string.
 */
export function resolveColumnType(kinds: ReadonlySet<CellKind>): ColumnType {
  if (kinds.size === 0) return 'string';
  if (kinds.size === 1) {
    const [only] = kinds;
    return SINGLE_KIND_TYPES[only];
  }
  if (kinds.size === 2 && kinds.has('int') && kinds.has('float')) return 'float64';
  return 'string';
}

/**
 * Convert a cell to its column's final type
 */
export function projectCell(cell: FlatCell | undefined, type: ColumnType): ProjectedCell {
  if (cell === undefined || cell === null) return null;

  switch (type) {
    case 'int64':
      if (typeof cell === 'bigint') return normalizeInt(cell);
      break;
    case 'float64':
      if (typeof cell === 'bigint') return Number(cell);
      break;
    case 'string':
    case 'json_text':
      if (cell instanceof JsonText) return cell.text;
      if (cell instanceof Uint8Array) return bytesToBase64(cell);
      return typeof cell === 'string' ? cell : String(cell);
  }

  return cell instanceof JsonText ? cell.text : cell;
}

/**
 * Incremental schema unifier for the rows of one channel.
 *
 * @example
 * ```typescript
 * const unifier = new SchemaUnifier({ channel: '/imu/data' });
 * for (const row of rows) unifier.add(row);
 * const { schema, rows: projected } = unifier.finish();
 * ```
 */
export class SchemaUnifier {
  private readonly columns = new Map<string, ColumnStats>();
  private readonly rows: FlatRow[] = [];
  private readonly maxRows: number;

  constructor(private readonly options: UnifyOptions = {}) {
    this.maxRows = options.maxRows ?? DEFAULT_MAX_ROWS_PER_CHANNEL;
    for (const column of BASELINE_SCHEMA) {
      this.columns.set(column.name, {
        seeded: SEEDED_KINDS[column.type],
        observed: new Set(),
        present: 0,
        sawNull: false,
      });
    }
  }

  /**
   * Number of rows buffered so far
   */
  get size(): number {
    return this.rows.length;
  }

  /**
   * Buffer a row and record its column kinds.
   * @throws ChannelBufferOverflowError when the row limit is exceeded
   */
  add(row: FlatRow): void {
    if (this.rows.length >= this.maxRows) {
      throw new ChannelBufferOverflowError(this.options.channel ?? '(unnamed)', this.maxRows);
    }
    this.rows.push(row);

    for (const [name, cell] of row) {
      let stats = this.columns.get(name);
      if (!stats) {
        stats = { observed: new Set(), present: 0, sawNull: false };
        this.columns.set(name, stats);
      }
      stats.present++;
      if (cell === null) {
        stats.sawNull = true;
      } else {
        stats.observed.add(cellKind(cell));
      }
    }
  }

  /**
   * Resolve the schema and project every buffered row onto it.
   */
  finish(): UnifyResult {
    if (this.rows.length === 0) {
      return {
        schema: Object.freeze(BASELINE_SCHEMA.map((column) => Object.freeze({ ...column }))),
        rows: [],
        conflicts: [],
      };
    }

    const schema: ColumnSchema[] = [];
    const conflicts: SchemaConflict[] = [];

    for (const [name, stats] of this.columns) {
      const kinds = new Set(stats.observed);
      if (stats.seeded) {
        kinds.add(stats.seeded);
      }
      const type = resolveColumnType(kinds);

      if (stats.observed.size > 1) {
        conflicts.push({
          column: name,
          observed: KIND_ORDER.filter((kind) => stats.observed.has(kind)),
          resolved: type,
        });
      }

      schema.push(
        Object.freeze({
          name,
          type,
          nullable: stats.sawNull || stats.present < this.rows.length,
        })
      );
    }

    const rows = this.rows.map((row) => schema.map((column) => projectCell(row.get(column.name), column.type)));

    return { schema: Object.freeze(schema), rows, conflicts };
  }
}

/**
 * Unify a complete set of rows in one call
 */
export function unify(rows: Iterable<FlatRow>, options: UnifyOptions = {}): UnifyResult {
  const unifier = new SchemaUnifier(options);
  for (const row of rows) {
    unifier.add(row);
  }
  return unifier.finish();
}
