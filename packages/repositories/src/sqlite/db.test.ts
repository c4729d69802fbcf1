// Tests for the catalog database setup

import { describe, it, expect } from 'vitest';
import { getTableConfig } from 'drizzle-orm/sqlite-core';
import { createDatabase } from './db.js';
import { catalogEntries } from './schema/index.js';

describe('createDatabase', () => {
  it('should create the columns the drizzle schema declares', () => {
    const { client } = createDatabase({ filename: ':memory:' });
    try {
      const created = client
        .prepare<[string], { name: string; notnull: number; pk: number }>(
          'SELECT name, "notnull", pk FROM pragma_table_info(?) ORDER BY cid'
        )
        .all('catalog_entries');
      const declared = getTableConfig(catalogEntries).columns.map((column) => ({
        name: column.name,
        notnull: column.notNull ? 1 : 0,
        pk: column.primary ? 1 : 0,
      }));

      expect(created).toEqual(declared);
    } finally {
      client.close();
    }
  });

  it('should create the drizzle schema indexes', () => {
    const { client } = createDatabase({ filename: ':memory:' });
    try {
      const created = client
        .prepare<[string], { name: string }>("SELECT name FROM pragma_index_list(?) WHERE origin = 'c'")
        .all('catalog_entries')
        .map((index) => index.name);
      const declared = getTableConfig(catalogEntries).indexes.map((index) => index.config.name);

      expect(created).toEqual(declared);
    } finally {
      client.close();
    }
  });
});
