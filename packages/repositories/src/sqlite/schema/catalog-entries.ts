import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { TableFormat, TableSchema } from '@flatlog/protocol';

/**
 * Catalog entries table - one row per registered table.
 *
 * Design notes:
 * - Keyed by table name; re-registration replaces the row in one transaction
 * - The schema column holds the TableSchema as JSON
 */
export const catalogEntries = sqliteTable(
  'catalog_entries',
  {
    tableName: text('table_name').primaryKey(),
    sourceFile: text('source_file').notNull(),
    physicalPath: text('physical_path').notNull(),
    format: text('format').$type<TableFormat>().notNull(),
    schema: text('schema', { mode: 'json' }).$type<TableSchema>().notNull(),
    schemaFingerprint: text('schema_fingerprint').notNull(),
    rowCount: integer('row_count').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [index('catalog_entries_source_idx').on(table.sourceFile)]
);
