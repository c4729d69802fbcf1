// Embedded SQL engine over an in-memory SQLite database.
// Registered tables are loaded from their artifacts on demand and live only
// as long as the engine, so queries can never change what is stored on disk.

import SqliteClient from 'better-sqlite3';
import type { ColumnType, ProjectedCell, ProjectedRow, TableSchema } from '@flatlog/protocol';
import { QueryError, ValidationError } from '@flatlog/protocol';
import type {
  QueryCursor,
  QueryEngine,
  ResultColumn,
  ResultRow,
  ResultValue,
} from '../interfaces/index.js';
import { normalizeInt } from '../tables/cells.js';

/**
 * Declared SQLite column type for each column type.
 * The names are chosen so SQLite's affinity rules pick INTEGER, REAL, TEXT or BLOB.
 */
const DECLARED_TYPES: Record<ColumnType, string> = {
  bool: 'BOOLEAN',
  int64: 'BIGINT',
  float64: 'DOUBLE',
  string: 'TEXT',
  bytes: 'BLOB',
  json_text: 'JSON_TEXT',
};

const INSERT_BATCH_SIZE = 1000;

/**
 * Quote an identifier for use in SQL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toBindable(cell: ProjectedCell): number | bigint | string | Buffer | null {
  if (typeof cell === 'boolean') return cell ? 1 : 0;
  if (cell instanceof Uint8Array) return Buffer.from(cell.buffer, cell.byteOffset, cell.byteLength);
  return cell;
}

function toResultValue(value: unknown): ResultValue {
  if (value === null || value === undefined) return null;
  // Integers arrive as bigint; only those beyond the safe range stay one
  if (typeof value === 'bigint') return normalizeInt(value);
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (value instanceof Uint8Array) return value;
  return String(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

class SqliteQueryCursor implements QueryCursor {
  private finished = false;

  constructor(
    readonly columns: readonly ResultColumn[],
    private readonly rows: IterableIterator<unknown>,
    private readonly sql: string
  ) {}

  next(): IteratorResult<ResultRow> {
    if (this.finished) {
      return { done: true, value: undefined };
    }

    let result: IteratorResult<unknown>;
    try {
      result = this.rows.next();
    } catch (error) {
      this.close();
      throw new QueryError(errorMessage(error), this.sql, error);
    }

    if (result.done) {
      this.finished = true;
      return { done: true, value: undefined };
    }

    // raw mode yields one array per row
    const values = Array.isArray(result.value) ? result.value : [result.value];
    return { done: false, value: values.map(toResultValue) };
  }

  return(): IteratorResult<ResultRow> {
    this.close();
    return { done: true, value: undefined };
  }

  close(): void {
    if (!this.finished) {
      this.finished = true;
      this.rows.return?.();
    }
  }

  [Symbol.iterator](): QueryCursor {
    return this;
  }
}

/**
 * QueryEngine backed by better-sqlite3.
 */
export class SqliteQueryEngine implements QueryEngine {
  private readonly client: SqliteClient.Database;
  private readonly registered: string[] = [];

  constructor(options: { filename?: string } = {}) {
    this.client = new SqliteClient(options.filename ?? ':memory:');
  }

  async registerTable(
    name: string,
    schema: TableSchema,
    rows: AsyncIterable<ProjectedRow> | Iterable<ProjectedRow>
  ): Promise<number> {
    if (schema.length === 0) {
      throw new ValidationError(`Table ${name} has no columns`, { field: 'schema' });
    }

    const columnsSql = schema
      .map((column) => `${quoteIdentifier(column.name)} ${DECLARED_TYPES[column.type]}`)
      .join(', ');
    this.client.exec(`CREATE TABLE ${quoteIdentifier(name)} (${columnsSql})`);
    this.registered.push(name);

    const placeholders = schema.map(() => '?').join(', ');
    const insert = this.client.prepare(
      `INSERT INTO ${quoteIdentifier(name)} VALUES (${placeholders})`
    );
    const insertBatch = this.client.transaction((batch: ProjectedRow[]) => {
      for (const row of batch) {
        insert.run(schema.map((_, index) => toBindable(row[index] ?? null)));
      }
    });

    let loaded = 0;
    let batch: ProjectedRow[] = [];
    try {
      for await (const row of rows) {
        batch.push(row);
        if (batch.length >= INSERT_BATCH_SIZE) {
          insertBatch(batch);
          loaded += batch.length;
          batch = [];
        }
      }
      if (batch.length > 0) {
        insertBatch(batch);
        loaded += batch.length;
      }
    } catch (error) {
      // A table that failed to load is not left half-filled
      this.client.exec(`DROP TABLE ${quoteIdentifier(name)}`);
      this.registered.splice(this.registered.indexOf(name), 1);
      throw error;
    }

    return loaded;
  }

  tables(): string[] {
    return [...this.registered];
  }

  query(sql: string): QueryCursor {
    let statement: SqliteClient.Statement<unknown[], unknown>;
    try {
      statement = this.client.prepare<unknown[], unknown>(sql);
    } catch (error) {
      throw new QueryError(errorMessage(error), sql, error);
    }

    if (!statement.reader) {
      throw new QueryError('Statement does not return rows; only read-only queries are allowed', sql);
    }
    if (!statement.readonly) {
      throw new QueryError('Statement modifies the database; only read-only queries are allowed', sql);
    }

    const columns: ResultColumn[] = statement.columns().map((column) => ({
      name: column.name,
      declaredType: column.type,
    }));

    let rows: IterableIterator<unknown>;
    try {
      rows = statement.safeIntegers(true).raw(true).iterate();
    } catch (error) {
      throw new QueryError(errorMessage(error), sql, error);
    }

    return new SqliteQueryCursor(columns, rows, sql);
  }

  close(): void {
    if (this.client.open) {
      this.client.close();
    }
  }
}
