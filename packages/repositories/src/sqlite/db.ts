import SqliteClient from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  /** Database file path, or ":memory:" */
  filename: string;
  /** How long a writer waits for another writer's lock, in milliseconds */
  busyTimeoutMs?: number;
  /** Fail instead of creating the file when it does not exist */
  fileMustExist?: boolean;
};

/**
 * DDL matching the drizzle schema in ./schema.
 * Applied on open so a fresh catalog needs no separate migration step.
 */
const CATALOG_SCHEMA = `
CREATE TABLE IF NOT EXISTS catalog_entries (
  table_name TEXT PRIMARY KEY NOT NULL,
  source_file TEXT NOT NULL,
  physical_path TEXT NOT NULL,
  format TEXT NOT NULL,
  schema TEXT NOT NULL,
  schema_fingerprint TEXT NOT NULL,
  row_count INTEGER NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS catalog_entries_source_idx ON catalog_entries(source_file);
`;

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   filename: '/data/catalog/catalog.db'
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = new SqliteClient(config.filename, {
    fileMustExist: config.fileMustExist ?? false,
    timeout: config.busyTimeoutMs ?? 5000,
  });

  // WAL lets queries read the catalog while another process registers a table
  client.pragma('journal_mode = WAL');
  client.exec(CATALOG_SCHEMA);

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
export type Client = ReturnType<typeof createDatabase>['client'];
