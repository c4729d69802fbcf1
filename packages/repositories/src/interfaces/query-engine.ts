import type { ProjectedRow, TableSchema } from '@flatlog/protocol';

/**
 * A value in a query result row
 */
export type ResultValue = number | bigint | string | Uint8Array | null;

/**
 * One result row, aligned with the cursor's columns
 */
export type ResultRow = ResultValue[];

/**
 * A column of a query result
 */
export type ResultColumn = {
  name: string;
  /** Declared type of the source column, when the column maps to one */
  declaredType: string | null;
};

/**
 * Lazy, finite, non-restartable iteration over query results.
 * Once exhausted or closed it yields nothing more.
 */
export interface QueryCursor extends IterableIterator<ResultRow> {
  readonly columns: readonly ResultColumn[];

  close(): void;
}

/**
 * An embedded SQL engine that tables are loaded into for ad hoc queries.
 */
export interface QueryEngine {
  /**
   * Create a relation named after the table and load its rows.
   * @returns Number of rows loaded
   */
  registerTable(
    name: string,
    schema: TableSchema,
    rows: AsyncIterable<ProjectedRow> | Iterable<ProjectedRow>
  ): Promise<number>;

  /**
   * Names of the relations registered so far
   */
  tables(): string[];

  /**
   * Prepare and start a read-only statement.
   * @throws QueryError if the engine rejects the SQL or the statement writes
   */
  query(sql: string): QueryCursor;

  close(): void;
}
